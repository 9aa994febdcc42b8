import { ValidationError } from "../core/ErrorHandler.js";

export type FunctionCall = {
    name: string;
    rawArguments: string;
};

export const FUNCTION_CALL_MARKER = "<function=";

const FUNCTION_CALL_PATTERN = /<function=(\w+)\{(.*?)\}>/g;

/**
 * Extracts inline tool requests of the form `<function=name{"key":"value"}>`.
 * `rawArguments` holds the text between the outer braces.
 */
export function parseFunctionCalls(text: string): FunctionCall[] {
    const calls: FunctionCall[] = [];
    for (const match of text.matchAll(FUNCTION_CALL_PATTERN)) {
        calls.push({
            name: match[1],
            rawArguments: match[2],
        });
    }
    return calls;
}

export function containsFunctionCall(text: string): boolean {
    return text.includes(FUNCTION_CALL_MARKER);
}

export function parseFunctionArguments(raw: string): Record<string, unknown> {
    const body = raw.trim().startsWith("{") ? raw : `{${raw}}`;

    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch (error) {
        throw new ValidationError(
            `Invalid tool arguments: ${error instanceof Error ? error.message : String(error)}`,
            { rawArguments: raw },
        );
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new ValidationError("Tool arguments must be a JSON object", {
            rawArguments: raw,
        });
    }
    return { ...parsed };
}
