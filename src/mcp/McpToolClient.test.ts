import assert from "node:assert/strict";
import { after, before, describe, test } from "node:test";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { McpServerConfig } from "../core/ConfigManager.js";
import { AppError, AppErrorCode } from "../core/errors.js";
import { formatToolResult } from "./format.js";
import { McpToolClient, resolveServerParameters } from "./McpToolClient.js";

const config: McpServerConfig = {
    command: "npx",
    args: ["-y", "example-mcp"],
};

function createToolServer(): Server {
    const server = new Server(
        {
            name: "test-tool-server",
            version: "1.0.0",
        },
        {
            capabilities: {
                tools: {},
            },
        },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: [
            {
                name: "echo",
                description: "Echo the given text",
                inputSchema: {
                    type: "object",
                    properties: {
                        text: { type: "string" },
                    },
                    required: ["text"],
                },
            },
            {
                name: "web-search",
                inputSchema: {
                    type: "object",
                },
            },
        ],
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        if (name === "echo") {
            return {
                content: [
                    { type: "text", text: `echo: ${String(args?.text)}` },
                    { type: "text", text: "done" },
                ],
            };
        }
        if (name === "web-search") {
            return {
                content: [{ type: "text", text: "search backend unavailable" }],
                isError: true,
            };
        }
        throw new Error(`Unknown tool: ${name}`);
    });

    return server;
}

describe("resolveServerParameters", () => {
    test("uses the configured command without a script", () => {
        assert.deepEqual(resolveServerParameters(config), {
            command: "npx",
            args: ["-y", "example-mcp"],
        });
    });

    test("picks the interpreter from the script extension", () => {
        assert.deepEqual(resolveServerParameters(config, "tools/server.py"), {
            command: "python",
            args: ["tools/server.py"],
        });
        assert.deepEqual(
            resolveServerParameters({ ...config, serverScriptPath: "server.js" }),
            { command: "node", args: ["server.js"] },
        );
    });

    test("rejects other script types", () => {
        assert.throws(
            () => resolveServerParameters(config, "server.ts"),
            /Server script must be a \.py or \.js file/,
        );
    });
});

describe("formatToolResult", () => {
    test("handles empty and string content", () => {
        assert.equal(formatToolResult(undefined), "");
        assert.equal(formatToolResult(null), "");
        assert.equal(formatToolResult("plain"), "plain");
    });

    test("joins text blocks and serializes other blocks", () => {
        assert.equal(
            formatToolResult([
                { type: "text", text: "first" },
                { type: "image", data: "AAAA", mimeType: "image/png" },
                "raw",
            ]),
            'first\n{"type":"image","data":"AAAA","mimeType":"image/png"}\nraw',
        );
    });

    test("formats single objects and primitives", () => {
        assert.equal(formatToolResult({ text: "only text" }), "only text");
        assert.equal(formatToolResult({ a: 1 }), '{\n  "a": 1\n}');
        assert.equal(formatToolResult(42), "42");
    });
});

describe("McpToolClient", () => {
    const server = createToolServer();
    const client = new McpToolClient({ config });

    before(async () => {
        const [clientTransport, serverTransport] =
            InMemoryTransport.createLinkedPair();
        await server.connect(serverTransport);
        await client.connect(clientTransport);
    });

    after(async () => {
        await client.close();
        await server.close();
    });

    test("caches the server's tools on connect", () => {
        assert.equal(client.isConnected(), true);
        assert.deepEqual(client.getTools(), [
            {
                name: "echo",
                description: "Echo the given text",
                inputSchema: {
                    type: "object",
                    properties: {
                        text: { type: "string" },
                    },
                    required: ["text"],
                },
            },
            {
                name: "web-search",
                description: "Tool for web search",
                inputSchema: {
                    type: "object",
                },
            },
        ]);
    });

    test("listTools refreshes from the server", async () => {
        const tools = await client.listTools();
        assert.deepEqual(
            tools.map((tool) => tool.name),
            ["echo", "web-search"],
        );
    });

    test("callTool returns the flattened text content", async () => {
        assert.equal(await client.callTool("echo", { text: "hi" }), "echo: hi\ndone");
    });

    test("callTool raises when the tool reports an error", async () => {
        await assert.rejects(
            client.callTool("web-search", { query: "x" }),
            (error: unknown) => {
                assert.ok(error instanceof AppError);
                assert.equal(error.code, AppErrorCode.ToolExecution);
                assert.equal(error.message, "search backend unavailable");
                return true;
            },
        );
    });

    test("callTool raises when the server rejects the call", async () => {
        await assert.rejects(
            client.callTool("nope", {}),
            (error: unknown) => {
                assert.ok(error instanceof AppError);
                assert.equal(error.code, AppErrorCode.ToolExecution);
                assert.match(error.message, /Unknown tool: nope/);
                return true;
            },
        );
    });
});

describe("McpToolClient without a session", () => {
    test("listTools and callTool require a connection", async () => {
        const client = new McpToolClient({ config });
        assert.equal(client.isConnected(), false);
        await assert.rejects(client.listTools(), /MCP client is not connected/);
        await assert.rejects(
            client.callTool("echo", {}),
            /MCP client is not connected/,
        );
    });

    test("close is a no-op when never connected", async () => {
        await new McpToolClient({ config }).close();
    });
});
