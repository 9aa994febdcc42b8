import Groq from "groq-sdk";
import type { LanguageModelConfig } from "../core/ConfigManager.js";
import { LanguageModelError, ValidationError } from "../core/ErrorHandler.js";
import { Logger } from "../core/Logger.js";
import { errorMessage } from "../core/errors.js";
import {
    createSystemMessage,
    personaPrompt,
    type ConversationMessage,
} from "../conversation/messages.js";
import { recordCompletionMetric, withSpan } from "../observability/telemetry.js";
import { containsFunctionCall } from "./function-calls.js";

export type CompletionRequest = {
    model: string;
    messages: ConversationMessage[];
    maxTokens: number;
    temperature: number;
};

/** Anything that can turn a chat transcript into the next assistant reply. */
export interface CompletionBackend {
    createCompletion(request: CompletionRequest): Promise<string | null>;
}

export type ToolSummary = {
    name: string;
};

type GroqMessage = Parameters<
    Groq["chat"]["completions"]["create"]
>[0]["messages"][number];

function toGroqMessage(message: ConversationMessage): GroqMessage {
    switch (message.role) {
        case "system":
            return { role: "system", content: message.content };
        case "assistant":
            return { role: "assistant", content: message.content };
        case "user":
            return { role: "user", content: message.content };
    }
}

export class GroqCompletionBackend implements CompletionBackend {
    private readonly groq: Groq;

    constructor(apiKey: string) {
        this.groq = new Groq({ apiKey });
    }

    async createCompletion(request: CompletionRequest): Promise<string | null> {
        // Tools are requested inline through the <function=...> syntax, so no
        // `tools` parameter is sent.
        const completion = await this.groq.chat.completions.create({
            model: request.model,
            messages: request.messages.map(toGroqMessage),
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            stream: false,
        });
        return completion.choices[0]?.message.content ?? null;
    }
}

const TOOL_HINT_TERMS = [
    "search",
    "find",
    "lookup",
    "information",
    "data",
    "how to",
    "what is",
];

const TOOL_REMINDER =
    " For queries that require searching for information or performing specific tasks, " +
    "please use the available tools to get real-time information. " +
    "Always use <function=tool_name{...}> syntax when appropriate.";

export type LanguageModelClientOptions = {
    config: LanguageModelConfig;
    backend?: CompletionBackend;
};

export class LanguageModelClient {
    private readonly config: LanguageModelConfig;
    private readonly backend: CompletionBackend;
    private readonly logger = Logger.getInstance().child("llm");

    constructor(options: LanguageModelClientOptions) {
        this.config = options.config;
        if (options.backend) {
            this.backend = options.backend;
            return;
        }
        if (!options.config.apiKey) {
            throw new ValidationError(
                "GROQ_API_KEY environment variable is not set",
            );
        }
        this.backend = new GroqCompletionBackend(options.config.apiKey);
    }

    get modelName(): string {
        return this.config.model;
    }

    buildSystemMessage(toolNames: readonly string[] = []): ConversationMessage {
        let content = personaPrompt(this.config.persona);
        if (toolNames.length === 0) {
            return createSystemMessage(content);
        }

        const available = toolNames.map((name) => `\`${name}\``).join(", ");
        content +=
            ` You have access to the following MCP tools: ${available}. ` +
            "These tools can help you gather information and perform various tasks. " +
            'To use tools, format your response like this: <function=tool_name{"param":"value"}>. ' +
            'For example, to search for information, use: <function=search{"query":"your search query","searchType":"web"}>. ' +
            "Always include explanatory text along with any function calls. " +
            `IMPORTANT: ONLY use the specific tool names listed above: ${available}. ` +
            "Do not invent or try to use tools that aren't in this list.";
        return createSystemMessage(content);
    }

    /**
     * Returns the assistant text for the conversation so far.
     * The caller's array is left untouched; the system prompt is added to a copy.
     */
    async generateCompletion(
        messages: readonly ConversationMessage[],
        tools: readonly ToolSummary[] = [],
        maxTokens: number = this.config.maxTokens,
    ): Promise<string> {
        const prepared = messages.map((message) => ({ ...message }));
        const toolNames = tools.map((tool) => tool.name);

        if (!prepared.some((message) => message.role === "system")) {
            prepared.unshift(this.buildSystemMessage(toolNames));
        }

        const encourageTools = shouldEncourageTools(prepared, toolNames.length);
        if (encourageTools) {
            const system = prepared.find((message) => message.role === "system");
            if (system) {
                system.content += TOOL_REMINDER;
            }
        }

        this.logger.info(`Calling LLM with ${messages.length} messages`);
        this.logger.debug("Sending messages to LLM", { messages: prepared });

        const startedAt = Date.now();
        let status: "success" | "error" = "success";
        try {
            const content = await withSpan(
                "llm.completion",
                {
                    "llm.model": this.config.model,
                    "llm.message_count": prepared.length,
                },
                () =>
                    this.backend.createCompletion({
                        model: this.config.model,
                        messages: prepared,
                        maxTokens,
                        temperature: this.config.temperature,
                    }),
            );

            const text = content ?? "";
            if (text.trim() === "") {
                this.logger.warn(
                    "Received empty response from LLM. This may indicate an issue with the model or the prompt.",
                );
            }
            if (encourageTools && !containsFunctionCall(text)) {
                this.logger.warn(
                    "LLM response did not include function calls despite the query being appropriate for tools.",
                );
            }

            this.logger.info("LLM response received", { content: text });
            return text;
        } catch (error) {
            status = "error";
            this.logger.error("Error calling LLM", error);
            throw new LanguageModelError(
                `Language model request failed: ${errorMessage(error)}`,
                this.config.model,
                error,
            );
        } finally {
            recordCompletionMetric(
                {
                    "llm.model": this.config.model,
                    "llm.status": status,
                },
                Date.now() - startedAt,
            );
        }
    }
}

function shouldEncourageTools(
    messages: readonly ConversationMessage[],
    toolCount: number,
): boolean {
    if (toolCount === 0 || messages.length < 3) {
        return false;
    }

    const lastUser = [...messages]
        .reverse()
        .find((message) => message.role === "user");
    if (!lastUser) {
        return false;
    }

    const text = lastUser.content.toLowerCase();
    return TOOL_HINT_TERMS.some((term) => text.includes(term));
}
