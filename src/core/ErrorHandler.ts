import { Logger } from "./Logger.js";
import { AppError, AppErrorCode, normalizeUnknownError } from "./errors.js";

export class ValidationError extends AppError {
    constructor(message: string, context?: Readonly<Record<string, unknown>>) {
        super({
            code: AppErrorCode.Validation,
            message,
            context,
        });
        this.name = "ValidationError";
    }
}

export class McpConnectionError extends AppError {
    constructor(message: string, cause?: unknown) {
        super({
            code: AppErrorCode.McpConnection,
            message,
            cause,
        });
        this.name = "McpConnectionError";
    }
}

export class ToolExecutionError extends AppError {
    constructor(
        message: string,
        public readonly toolName: string,
        cause?: unknown,
    ) {
        super({
            code: AppErrorCode.ToolExecution,
            message,
            cause,
            context: {
                toolName,
            },
        });
        this.name = "ToolExecutionError";
    }
}

export class LanguageModelError extends AppError {
    constructor(
        message: string,
        public readonly model: string,
        cause?: unknown,
    ) {
        super({
            code: AppErrorCode.LanguageModel,
            message,
            cause,
            context: {
                model,
            },
        });
        this.name = "LanguageModelError";
    }
}

export class DiscordBotError extends AppError {
    constructor(message: string, cause?: unknown) {
        super({
            code: AppErrorCode.Discord,
            message,
            cause,
        });
        this.name = "DiscordBotError";
    }
}

const logger = Logger.getInstance().child("error-handler");

export class ErrorHandler {
    static normalize(
        error: unknown,
        fallbackCode: AppErrorCode = AppErrorCode.Internal,
    ): AppError {
        return normalizeUnknownError(error, fallbackCode);
    }

    /** Logs an unexpected error once and returns its normalized form. */
    static report(
        error: unknown,
        context: Readonly<Record<string, unknown>> = {},
        log: Logger = logger,
    ): AppError {
        const normalized = ErrorHandler.normalize(error);
        log.error("Relay error", {
            ...context,
            code: normalized.code,
            err: normalized,
        });
        return normalized;
    }
}
