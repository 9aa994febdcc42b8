import type { Logger as PinoLogger } from "pino";
import { getRuntimeLogger } from "../observability/logger.js";

type LogMethod = "error" | "warn" | "info" | "debug";

/**
 * Application-wide logging facade over the pino runtime logger.
 * Modules take a child bound to their name: `Logger.getInstance().child("mcp")`.
 */
export class Logger {
    private static instance: Logger;
    private readonly delegate: PinoLogger;

    private constructor(delegate: PinoLogger) {
        this.delegate = delegate;
    }

    /** Wraps a specific pino logger, such as one writing to a test stream. */
    static fromPino(delegate: PinoLogger): Logger {
        return new Logger(delegate);
    }

    static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger(getRuntimeLogger());
        }
        return Logger.instance;
    }

    child(context: string): Logger {
        const trimmed = context.trim();
        if (!trimmed) {
            return this;
        }
        return new Logger(
            this.delegate.child({
                module: trimmed,
            }),
        );
    }

    error(message: string, errorOrMeta?: unknown): void {
        this.write("error", message, errorOrMeta);
    }

    warn(message: string, meta?: unknown): void {
        this.write("warn", message, meta);
    }

    info(message: string, meta?: unknown): void {
        this.write("info", message, meta);
    }

    debug(message: string, meta?: unknown): void {
        this.write("debug", message, meta);
    }

    private write(level: LogMethod, message: string, data?: unknown): void {
        if (data === undefined) {
            this.delegate[level](message);
            return;
        }

        if (data instanceof Error) {
            this.delegate[level]({ err: data }, message);
            return;
        }

        if (isRecord(data)) {
            this.delegate[level](data, message);
            return;
        }

        this.delegate[level]({ value: data }, message);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
