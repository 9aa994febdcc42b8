import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { McpServerConfig } from "../core/ConfigManager.js";
import {
    McpConnectionError,
    ToolExecutionError,
    ValidationError,
} from "../core/ErrorHandler.js";
import { Logger } from "../core/Logger.js";
import { errorMessage } from "../core/errors.js";
import { recordToolCallMetric, withSpan } from "../observability/telemetry.js";
import { formatToolResult } from "./format.js";

export type ToolDescriptor = {
    name: string;
    description: string;
    inputSchema: Record<string, unknown>;
};

export type ServerParameters = {
    command: string;
    args: string[];
};

/** What the query pipeline needs from a tool server connection. */
export interface ToolSession {
    isConnected(): boolean;
    getTools(): ToolDescriptor[];
    listTools(): Promise<ToolDescriptor[]>;
    callTool(name: string, args: Record<string, unknown>): Promise<string>;
}

export function describeTool(tool: {
    name: string;
    description?: string;
    inputSchema: object;
}): ToolDescriptor {
    return {
        name: tool.name,
        description: tool.description || `Tool for ${tool.name.replace(/-/g, " ")}`,
        inputSchema: { ...tool.inputSchema },
    };
}

export function resolveServerParameters(
    config: McpServerConfig,
    scriptPath: string | undefined = config.serverScriptPath,
): ServerParameters {
    if (!scriptPath) {
        return { command: config.command, args: [...config.args] };
    }

    if (scriptPath.endsWith(".py")) {
        return { command: "python", args: [scriptPath] };
    }
    if (scriptPath.endsWith(".js")) {
        return { command: "node", args: [scriptPath] };
    }
    throw new ValidationError("Server script must be a .py or .js file", {
        scriptPath,
    });
}

function inheritedEnvironment(): Record<string, string> {
    return Object.fromEntries(
        Object.entries(process.env).filter(
            (entry): entry is [string, string] => entry[1] !== undefined,
        ),
    );
}

export type McpToolClientOptions = {
    config: McpServerConfig;
    clientName?: string;
    clientVersion?: string;
};

export class McpToolClient implements ToolSession {
    private readonly config: McpServerConfig;
    private readonly clientName: string;
    private readonly clientVersion: string;
    private readonly logger = Logger.getInstance().child("mcp");
    private client: Client | null = null;
    private tools: ToolDescriptor[] = [];

    constructor(options: McpToolClientOptions) {
        this.config = options.config;
        this.clientName = options.clientName ?? "mcp-chat-relay";
        this.clientVersion = options.clientVersion ?? "0.1.0";
    }

    isConnected(): boolean {
        return this.client !== null;
    }

    /**
     * Opens the session and caches the server's tool list.
     * Without a transport, the configured server is spawned over stdio.
     */
    async connect(transport?: Transport): Promise<void> {
        if (this.client) {
            return;
        }

        const client = new Client(
            {
                name: this.clientName,
                version: this.clientVersion,
            },
            {
                capabilities: {},
            },
        );

        try {
            await client.connect(transport ?? this.createStdioTransport());
            this.client = client;
            this.logger.info("Connected to MCP server");
            await this.listTools();
        } catch (error) {
            this.client = null;
            this.logger.error("Error connecting to MCP server", error);
            try {
                await client.close();
            } catch (closeError) {
                this.logger.warn("Could not close half-open MCP session", closeError);
            }
            if (error instanceof ValidationError) {
                throw error;
            }
            throw new McpConnectionError(
                `Failed to connect to MCP server: ${errorMessage(error)}`,
                error,
            );
        }

        this.logger.info(
            `Available tools: ${this.tools.map((tool) => tool.name).join(", ") || "(none)"}`,
        );
        for (const tool of this.tools) {
            this.logger.debug(`Tool '${tool.name}' details`, {
                description: tool.description,
                inputSchema: JSON.stringify(tool.inputSchema).slice(0, 200),
            });
        }
    }

    getTools(): ToolDescriptor[] {
        return [...this.tools];
    }

    async listTools(): Promise<ToolDescriptor[]> {
        const client = this.requireClient();
        const collected: ToolDescriptor[] = [];
        let cursor: string | undefined;

        try {
            do {
                const page = await client.listTools(cursor ? { cursor } : undefined);
                collected.push(...page.tools.map(describeTool));
                cursor = page.nextCursor;
            } while (cursor);
        } catch (error) {
            this.logger.error("Error getting MCP tools", error);
            throw new McpConnectionError(
                `Failed to list MCP tools: ${errorMessage(error)}`,
                error,
            );
        }

        this.tools = collected;
        return [...collected];
    }

    async callTool(name: string, args: Record<string, unknown>): Promise<string> {
        const client = this.requireClient();
        const startedAt = Date.now();
        let status: "success" | "error" = "success";

        this.logger.info(`Calling tool ${name}`, { args });
        try {
            return await withSpan(
                "mcp.tool_call",
                {
                    "mcp.tool": name,
                },
                async () => {
                    let result: Awaited<ReturnType<Client["callTool"]>>;
                    try {
                        result = await client.callTool({ name, arguments: args });
                    } catch (error) {
                        throw new ToolExecutionError(
                            `Tool '${name}' failed: ${errorMessage(error)}`,
                            name,
                            error,
                        );
                    }

                    const text = formatToolResult(
                        "content" in result ? result.content : result.toolResult,
                    );
                    if ("isError" in result && result.isError === true) {
                        throw new ToolExecutionError(
                            text || `Tool '${name}' reported an error`,
                            name,
                        );
                    }

                    this.logger.info(`Tool ${name} result received`);
                    return text;
                },
            );
        } catch (error) {
            status = "error";
            this.logger.error(`Error calling tool ${name}`, error);
            throw error;
        } finally {
            recordToolCallMetric(
                {
                    "mcp.tool": name,
                    "mcp.status": status,
                },
                Date.now() - startedAt,
            );
        }
    }

    async close(): Promise<void> {
        const client = this.client;
        if (!client) {
            return;
        }

        this.client = null;
        this.tools = [];
        try {
            await client.close();
            this.logger.info("Disconnected from MCP server");
        } catch (error) {
            this.logger.error("Error during MCP cleanup", error);
            throw new McpConnectionError(
                `Failed to close MCP session: ${errorMessage(error)}`,
                error,
            );
        }
    }

    private createStdioTransport(): StdioClientTransport {
        const parameters = resolveServerParameters(this.config);
        this.logger.info(
            `Starting MCP server with: ${[parameters.command, ...parameters.args].join(" ")}`,
        );
        return new StdioClientTransport({
            command: parameters.command,
            args: parameters.args,
            env: inheritedEnvironment(),
        });
    }

    private requireClient(): Client {
        if (!this.client) {
            throw new McpConnectionError("MCP client is not connected");
        }
        return this.client;
    }
}
