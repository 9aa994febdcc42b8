import type { ToolDescriptor } from "../mcp/McpToolClient.js";

export const DISCORD_MESSAGE_LIMIT = 2000;

export function splitMessage(
    text: string,
    limit: number = DISCORD_MESSAGE_LIMIT,
): string[] {
    if (limit < 1) {
        throw new RangeError("limit must be at least 1");
    }

    // Code points, so a surrogate pair never straddles two chunks.
    const chars = Array.from(text);
    const chunks: string[] = [];
    for (let start = 0; start < chars.length; start += limit) {
        chunks.push(chars.slice(start, start + limit).join(""));
    }
    return chunks;
}

export function formatToolList(
    tools: readonly Pick<ToolDescriptor, "name" | "description">[],
): string {
    let text = "**Available Tools:**\n\n";
    for (const tool of tools) {
        text += `**${tool.name}**: ${tool.description}\n\n`;
    }
    return text;
}

export function buildHelpText(prefix: string): string {
    return [
        "**MCP Chat Relay**",
        "",
        "I answer questions with an AI model that can use external tools.",
        "",
        "**How to use me:**",
        "- Mention me with your question",
        "- Send me a direct message with your question",
        "",
        "**Available commands:**",
        `\`${prefix}help\` - Display this help message`,
        `\`${prefix}tools\` - List available tools`,
        "",
    ].join("\n");
}
