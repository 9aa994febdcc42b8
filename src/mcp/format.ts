function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

function stringify(value: unknown, indent?: number): string {
    try {
        return JSON.stringify(value, null, indent) ?? String(value);
    } catch {
        return String(value);
    }
}

/**
 * Flattens MCP tool output into the plain text fed back to the model.
 * Text blocks contribute their text; other blocks are serialized as JSON.
 */
export function formatToolResult(content: unknown): string {
    if (content === null || content === undefined) {
        return "";
    }

    if (typeof content === "string") {
        return content;
    }

    if (Array.isArray(content)) {
        return content
            .map((item) => {
                if (typeof item === "string") {
                    return item;
                }
                if (isRecord(item) && typeof item.text === "string") {
                    return item.text;
                }
                return stringify(item);
            })
            .join("\n");
    }

    if (isRecord(content)) {
        if (typeof content.text === "string") {
            return content.text;
        }
        return stringify(content, 2);
    }

    return String(content);
}
