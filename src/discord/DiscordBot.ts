import {
    ActivityType,
    Client,
    Events,
    GatewayIntentBits,
    Partials,
} from "discord.js";
import { DiscordBotError } from "../core/ErrorHandler.js";
import { Logger } from "../core/Logger.js";
import { errorMessage } from "../core/errors.js";
import type {
    DiscordMessageHandler,
    IncomingMessage,
} from "./DiscordMessageHandler.js";

type ChannelLike = {
    id: string;
    send?: (text: string) => Promise<unknown>;
    sendTyping?: () => Promise<unknown>;
};

/** The parts of a discord.js `Message` the relay reads. */
export interface DiscordMessageLike {
    id: string;
    channelId: string;
    content: string;
    author: { id: string; bot: boolean };
    mentions: { users: { has(userId: string): boolean } };
    channel: ChannelLike;
    inGuild(): boolean;
    reply(text: string): Promise<unknown>;
}

export function toIncomingMessage(
    message: DiscordMessageLike,
    selfId: string | null,
): IncomingMessage {
    const channel = message.channel;

    return {
        id: message.id,
        channelId: message.channelId,
        content: message.content,
        author: { bot: message.author.bot },
        isFromSelf: selfId !== null && message.author.id === selfId,
        isDirect: !message.inGuild(),
        // Direct user mentions only: @everyone, roles and replies do not count.
        mentionsBot: selfId !== null && message.mentions.users.has(selfId),
        botUserId: selfId,
        reply: async (text) => {
            await message.reply(text);
        },
        send: async (text) => {
            if (!channel.send) {
                throw new DiscordBotError(
                    `Channel ${message.channelId} does not accept messages`,
                );
            }
            await channel.send(text);
        },
        sendTyping: async () => {
            if (channel.sendTyping) {
                await channel.sendTyping();
            }
        },
    };
}

export class DiscordBot {
    private readonly client: Client;
    private readonly logger = Logger.getInstance().child("discord");

    constructor(private readonly handler: DiscordMessageHandler) {
        this.client = new Client({
            intents: [
                GatewayIntentBits.Guilds,
                GatewayIntentBits.GuildMessages,
                GatewayIntentBits.MessageContent,
                GatewayIntentBits.DirectMessages,
            ],
            partials: [Partials.Channel, Partials.Message],
        });

        this.client.once(Events.ClientReady, (readyClient) => {
            this.logger.info(`Discord bot logged in as ${readyClient.user.tag}`);
            readyClient.user.setPresence({
                activities: [
                    {
                        name: "all messages",
                        type: ActivityType.Listening,
                    },
                ],
                status: "online",
            });
        });

        this.client.on(Events.MessageCreate, (message) => {
            this.handler
                .handle(toIncomingMessage(message, this.client.user?.id ?? null))
                .catch((error: unknown) => {
                    this.logger.error("Unhandled Discord message error", error);
                });
        });

        this.client.on(Events.Error, (error) => {
            this.logger.error("Discord client error", error);
        });
    }

    isRunning(): boolean {
        return this.client.isReady();
    }

    async start(token: string): Promise<void> {
        try {
            await this.client.login(token);
        } catch (error) {
            this.logger.error("Error starting Discord bot", error);
            if (
                error instanceof Error &&
                error.message.includes("Used disallowed intents")
            ) {
                throw new DiscordBotError(
                    "Used disallowed intents. Enable the Message Content intent in the Discord Developer Portal -> Bot -> Privileged Gateway Intents.",
                    error,
                );
            }
            throw new DiscordBotError(
                `Failed to start Discord bot: ${errorMessage(error)}`,
                error,
            );
        }
    }

    async close(): Promise<void> {
        try {
            await this.client.destroy();
            this.logger.info("Discord bot closed");
        } catch (error) {
            this.logger.error("Error closing Discord bot", error);
            throw new DiscordBotError(
                `Failed to close Discord bot: ${errorMessage(error)}`,
                error,
            );
        }
    }
}
