import { Logger } from "../core/Logger.js";
import {
    getLastAssistantMessage,
    type ConversationMessage,
} from "../conversation/messages.js";
import type { ToolDescriptor } from "../mcp/McpToolClient.js";
import { buildHelpText, formatToolList, splitMessage } from "./format.js";

export const FALLBACK_REPLY =
    "I'm sorry, I'm having trouble processing that request. Could you try asking in a different way?";
export const QUERY_ERROR_REPLY =
    "Sorry, I encountered an error while processing your request.";
export const TOOLS_ERROR_REPLY =
    "Sorry, I encountered an error while retrieving the tools.";

/** A chat message reduced to what the handler reads and how it answers. */
export interface IncomingMessage {
    id: string;
    channelId: string;
    content: string;
    author: { bot: boolean };
    isFromSelf: boolean;
    isDirect: boolean;
    mentionsBot: boolean;
    botUserId: string | null;
    reply(text: string): Promise<void>;
    send(text: string): Promise<void>;
    sendTyping(): Promise<void>;
}

export interface QueryRunner {
    processQuery(
        query: string,
        options?: { logPrefix?: string },
    ): Promise<ConversationMessage[]>;
    listTools(): Promise<ToolDescriptor[]>;
}

export type DiscordMessageHandlerOptions = {
    relay: QueryRunner;
    commandPrefix: string;
    requireMention: boolean;
    /** Discord drops the typing indicator after about 10 s. */
    typingIntervalMs?: number;
};

export class DiscordMessageHandler {
    private readonly relay: QueryRunner;
    private readonly commandPrefix: string;
    private readonly requireMention: boolean;
    private readonly typingIntervalMs: number;
    private readonly inFlight = new Set<string>();
    private readonly logger = Logger.getInstance().child("discord");

    constructor(options: DiscordMessageHandlerOptions) {
        this.relay = options.relay;
        this.commandPrefix = options.commandPrefix;
        this.requireMention = options.requireMention;
        this.typingIntervalMs = options.typingIntervalMs ?? 8_000;
    }

    async handle(message: IncomingMessage): Promise<void> {
        if (message.isFromSelf || message.author.bot) {
            return;
        }
        if (this.requireMention && !message.isDirect && !message.mentionsBot) {
            return;
        }

        const command = this.parseCommand(message.content);
        if (command === "help") {
            await message.send(buildHelpText(this.commandPrefix));
            return;
        }
        if (command === "tools") {
            await this.sendToolList(message);
            return;
        }

        await this.answer(message);
    }

    private parseCommand(content: string): string | null {
        const trimmed = content.trim();
        if (!trimmed.startsWith(this.commandPrefix)) {
            return null;
        }
        const name = trimmed.slice(this.commandPrefix.length).split(/\s+/, 1)[0];
        return name === "help" || name === "tools" ? name : null;
    }

    private async sendToolList(message: IncomingMessage): Promise<void> {
        let text: string;
        try {
            text = formatToolList(await this.relay.listTools());
        } catch (error) {
            this.logger.error("Error getting tools", error);
            await message.send(TOOLS_ERROR_REPLY);
            return;
        }

        for (const chunk of splitMessage(text)) {
            await message.send(chunk);
        }
    }

    private async answer(message: IncomingMessage): Promise<void> {
        const key = `${message.channelId}_${message.id}`;
        if (this.inFlight.has(key)) {
            return;
        }

        const query = stripBotMention(message.content, message.botUserId);
        if (!query) {
            return;
        }

        this.inFlight.add(key);
        let typingTimer: NodeJS.Timeout | undefined;
        try {
            await message.sendTyping();
            typingTimer = setInterval(() => {
                message.sendTyping().catch((error: unknown) => {
                    this.logger.warn("Could not refresh typing indicator", error);
                });
            }, this.typingIntervalMs);
            this.logger.info(`Processing Discord query: ${query}`);
            const messages = await this.relay.processQuery(query, {
                logPrefix: "discord",
            });

            const chunks = splitMessage(getLastAssistantMessage(messages));
            if (chunks.length === 0) {
                await message.reply(FALLBACK_REPLY);
                return;
            }
            const [first, ...rest] = chunks;
            await message.reply(first);
            for (const chunk of rest) {
                await message.send(chunk);
            }
        } catch (error) {
            this.logger.error("Error processing Discord query", error);
            await message.reply(QUERY_ERROR_REPLY);
        } finally {
            clearInterval(typingTimer);
            this.inFlight.delete(key);
        }
    }
}

export function stripBotMention(content: string, botUserId: string | null): string {
    if (!botUserId) {
        return content.trim();
    }
    return content.replace(new RegExp(`<@!?${botUserId}>`, "g"), "").trim();
}
