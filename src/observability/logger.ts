import { context as otelContext, trace } from "@opentelemetry/api";
import pino, { type Logger as PinoLogger } from "pino";

const DEFAULT_SERVICE_NAME = "mcp-chat-relay";
const DEFAULT_LOG_LEVEL = "info";
const SECRET_REDACT_PATHS = [
    "token",
    "*.token",
    "apiKey",
    "*.apiKey",
    "authorization",
    "*.authorization",
    "headers.authorization",
    "GROQ_API_KEY",
    "DISCORD_TOKEN",
];

export function parseBoolean(
    value: string | undefined,
    fallback: boolean,
): boolean {
    if (value === undefined) {
        return fallback;
    }

    const normalized = value.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no") {
        return false;
    }
    return fallback;
}

function isDevelopmentRun(): boolean {
    const lifecycle = process.env.npm_lifecycle_event?.toLowerCase() || "";
    return process.env.NODE_ENV === "development" || lifecycle.startsWith("dev");
}

function resolveLogStyle(): "pretty" | "json" {
    const raw = process.env.LOG_STYLE?.trim().toLowerCase();
    if (raw === "pretty" || raw === "json") {
        return raw;
    }
    return process.stderr.isTTY || isDevelopmentRun() ? "pretty" : "json";
}

function buildPrettyTransport() {
    return pino.transport({
        target: "pino-pretty",
        options: {
            colorize: parseBoolean(process.env.LOG_COLOR, process.stderr.isTTY),
            singleLine: true,
            levelFirst: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname,service",
            messageFormat:
                "{if module}{module} {end}{msg}{if trace_id} trace={trace_id}{end}",
        },
    });
}

function buildTraceContextBindings(): Record<string, string> {
    const span = trace.getSpan(otelContext.active());
    if (!span) {
        return {};
    }

    const spanContext = span.spanContext();
    if (!spanContext.traceId || !spanContext.spanId) {
        return {};
    }

    return {
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
    };
}

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function normalizeLogLevel(value: string | undefined): string {
    const normalized = value?.trim().toLowerCase() ?? "";
    return LOG_LEVELS.has(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

const serviceName = process.env.OTEL_SERVICE_NAME || DEFAULT_SERVICE_NAME;
const baseLogger = pino(
    {
        level: normalizeLogLevel(process.env.LOG_LEVEL),
        enabled: parseBoolean(process.env.ENABLE_LOGGING, true),
        base: {
            service: serviceName,
        },
        redact: {
            paths: SECRET_REDACT_PATHS,
            censor: "[REDACTED]",
        },
        mixin: buildTraceContextBindings,
    },
    resolveLogStyle() === "pretty" ? buildPrettyTransport() : undefined,
);

export function getRuntimeLogger(): PinoLogger {
    return baseLogger;
}

export function getModuleLogger(moduleName: string): PinoLogger {
    return baseLogger.child({
        module: moduleName,
    });
}
