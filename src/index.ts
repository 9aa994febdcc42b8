import { serve, type ServerType } from "@hono/node-server";
import { ConfigManager } from "./core/ConfigManager.js";
import { Logger } from "./core/Logger.js";
import { ConversationLog } from "./conversation/ConversationLog.js";
import { DiscordBot } from "./discord/DiscordBot.js";
import { DiscordMessageHandler } from "./discord/DiscordMessageHandler.js";
import { createHttpApp } from "./http-app.js";
import { LanguageModelClient } from "./llm/LanguageModelClient.js";
import { McpToolClient } from "./mcp/McpToolClient.js";
import { shutdownTelemetry } from "./observability/telemetry.js";
import { QueryProcessor } from "./relay/QueryProcessor.js";

const logger = Logger.getInstance().child("server");

let mcpClient: McpToolClient | null = null;
let discordBot: DiscordBot | null = null;
let httpServer: ServerType | null = null;
let shuttingDown = false;

function closeHttpServer(server: ServerType): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => {
            if (error) {
                reject(error);
                return;
            }
            resolve();
        });
    });
}

async function main() {
    const configManager = ConfigManager.getInstance();
    const config = configManager.getConfig();

    logger.info("=".repeat(60));
    logger.info("MCP Chat Relay starting");
    logger.info(`Groq API key: ${config.llm.apiKey ? "set" : "NOT SET"}`);
    logger.info(`Groq model: ${config.llm.model}`);
    logger.info(`Discord token: ${config.discord.token ? "set" : "not set"}`);
    logger.info(`Max tool rounds: ${config.maxToolRounds}`);
    logger.info("=".repeat(60));

    mcpClient = new McpToolClient({ config: config.mcp });
    try {
        await mcpClient.connect();
    } catch (error) {
        logger.error("Failed to connect to MCP server", error);
        process.exit(1);
    }

    const conversationLog = new ConversationLog({
        directory: config.conversations.directory,
        enabled: config.conversations.logEnabled,
    });
    logger.info(
        conversationLog.isEnabled()
            ? `Conversation logs: ${config.conversations.directory}`
            : "Conversation logs disabled",
    );

    const processor = new QueryProcessor({
        tools: mcpClient,
        llm: new LanguageModelClient({ config: config.llm }),
        conversationLog,
        maxToolRounds: config.maxToolRounds,
    });

    const app = createHttpApp({
        relay: processor,
        isDiscordRunning: () => discordBot?.isRunning() ?? false,
    });
    httpServer = serve({
        fetch: app.fetch,
        port: config.http.port,
        hostname: config.http.host,
    });
    logger.info(
        `HTTP API listening on http://${config.http.host}:${config.http.port}`,
    );
    logger.info(`Query endpoint: POST http://localhost:${config.http.port}/query`);

    const token = config.discord.token;
    if (configManager.isDiscordEnabled() && token) {
        const bot = new DiscordBot(
            new DiscordMessageHandler({
                relay: processor,
                commandPrefix: config.discord.commandPrefix,
                requireMention: config.discord.requireMention,
            }),
        );
        discordBot = bot;
        bot.start(token).catch((error: unknown) => {
            logger.error("Discord bot failed to start; continuing without it", error);
            discordBot = null;
        });
    } else {
        logger.info("Discord bot disabled (no DISCORD_TOKEN or DISCORD_ENABLED=false)");
    }
}

async function shutdown(signal: string): Promise<void> {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down MCP Chat Relay...`);

    const steps: Array<[string, () => Promise<void>]> = [];
    const bot = discordBot;
    if (bot) {
        steps.push(["Discord bot", () => bot.close()]);
    }
    const client = mcpClient;
    if (client) {
        steps.push(["MCP session", () => client.close()]);
    }
    const server = httpServer;
    if (server) {
        steps.push(["HTTP server", () => closeHttpServer(server)]);
    }
    steps.push(["telemetry", shutdownTelemetry]);

    for (const [name, close] of steps) {
        try {
            await close();
        } catch (error) {
            logger.warn(`Failed to close ${name}`, error);
        }
    }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
        shutdown(signal)
            .catch((error: unknown) => {
                logger.error("Shutdown failed", error);
            })
            .finally(() => process.exit(0));
    });
}

main().catch((error: unknown) => {
    logger.error("Fatal error", error);
    process.exit(1);
});
