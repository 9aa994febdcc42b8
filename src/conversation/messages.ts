import type { Persona } from "../core/ConfigManager.js";

export type MessageRole = "system" | "user" | "assistant";

export type ConversationMessage = {
    role: MessageRole;
    content: string;
};

const PERSONA_PROMPTS: Record<Persona, string> = {
    assistant:
        "You are a helpful assistant. " +
        "You have access to MCP tools that can help you gather information " +
        "and perform various tasks to assist users with their queries.",
    general: "You are a helpful assistant.",
    researcher:
        "You are a research assistant with expertise in finding and analyzing information. " +
        "You have access to search and research tools to help answer questions and gather data.",
};

export function createUserMessage(content: string): ConversationMessage {
    return { role: "user", content };
}

export function createSystemMessage(content: string): ConversationMessage {
    return { role: "system", content };
}

export function createAssistantMessage(
    content: string | null | undefined,
): ConversationMessage {
    return { role: "assistant", content: content ?? "" };
}

export function isPersona(value: string): value is Persona {
    return Object.prototype.hasOwnProperty.call(PERSONA_PROMPTS, value);
}

export function personaPrompt(persona: string): string {
    return isPersona(persona) ? PERSONA_PROMPTS[persona] : PERSONA_PROMPTS.general;
}

export function defaultSystemMessage(
    persona: string = "assistant",
): ConversationMessage {
    return createSystemMessage(personaPrompt(persona));
}

export function getLastAssistantMessage(
    messages: readonly ConversationMessage[],
): string {
    for (let index = messages.length - 1; index >= 0; index -= 1) {
        const message = messages[index];
        if (message.role === "assistant") {
            return message.content;
        }
    }
    return "";
}
