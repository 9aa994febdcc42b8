export const enum AppErrorCode {
    Validation = "VALIDATION_ERROR",
    NotFound = "NOT_FOUND_ERROR",
    McpConnection = "MCP_CONNECTION_ERROR",
    ToolExecution = "TOOL_EXECUTION_ERROR",
    LanguageModel = "LANGUAGE_MODEL_ERROR",
    Discord = "DISCORD_ERROR",
    Internal = "INTERNAL_ERROR",
}

export type AppErrorContext = Readonly<Record<string, unknown>>;

type AppErrorInput = {
    code: AppErrorCode;
    message: string;
    cause?: unknown;
    context?: AppErrorContext;
};

export class AppError extends Error {
    readonly code: AppErrorCode;
    readonly cause?: unknown;
    readonly context?: AppErrorContext;

    constructor(input: AppErrorInput) {
        super(input.message);
        this.name = "AppError";
        this.code = input.code;
        this.cause = input.cause;
        this.context = input.context;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

function inferCode(error: unknown, fallbackCode: AppErrorCode): AppErrorCode {
    if (!isRecord(error)) {
        return fallbackCode;
    }

    const code = error.code;
    if (typeof code === "string") {
        switch (code.trim().toUpperCase()) {
            case AppErrorCode.Validation:
                return AppErrorCode.Validation;
            case AppErrorCode.NotFound:
                return AppErrorCode.NotFound;
            case AppErrorCode.McpConnection:
                return AppErrorCode.McpConnection;
            case AppErrorCode.ToolExecution:
                return AppErrorCode.ToolExecution;
            case AppErrorCode.LanguageModel:
                return AppErrorCode.LanguageModel;
            case AppErrorCode.Discord:
                return AppErrorCode.Discord;
            case AppErrorCode.Internal:
                return AppErrorCode.Internal;
            default:
                break;
        }
    }

    const name = error.name;
    if (typeof name === "string") {
        if (name === "ZodError" || name === "ValidationError") {
            return AppErrorCode.Validation;
        }
        if (name === "GroqError" || name === "APIError") {
            return AppErrorCode.LanguageModel;
        }
        if (name === "DiscordAPIError") {
            return AppErrorCode.Discord;
        }
    }

    return fallbackCode;
}

export function normalizeUnknownError(
    error: unknown,
    fallbackCode: AppErrorCode = AppErrorCode.Internal,
): AppError {
    if (error instanceof AppError) {
        return error;
    }

    if (error instanceof Error) {
        return new AppError({
            code: inferCode(error, fallbackCode),
            message: error.message,
            cause: error,
        });
    }

    return new AppError({
        code: inferCode(error, fallbackCode),
        message: String(error),
        cause: error,
    });
}

export function toPublicErrorPayload(
    error: unknown,
    fallbackCode: AppErrorCode = AppErrorCode.Internal,
): { code: AppErrorCode; message: string } {
    const normalized = normalizeUnknownError(error, fallbackCode);
    return {
        code: normalized.code,
        message: normalized.message,
    };
}

export function httpStatusForError(
    error: unknown,
): 400 | 404 | 500 | 502 | 503 {
    switch (normalizeUnknownError(error).code) {
        case AppErrorCode.Validation:
            return 400;
        case AppErrorCode.NotFound:
            return 404;
        case AppErrorCode.LanguageModel:
        case AppErrorCode.ToolExecution:
            return 502;
        case AppErrorCode.McpConnection:
            return 503;
        default:
            return 500;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
