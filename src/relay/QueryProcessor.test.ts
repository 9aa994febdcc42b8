import assert from "node:assert/strict";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, test } from "node:test";
import { ToolExecutionError } from "../core/ErrorHandler.js";
import { ConversationLog } from "../conversation/ConversationLog.js";
import type { ConversationMessage } from "../conversation/messages.js";
import type { ToolSummary } from "../llm/LanguageModelClient.js";
import type { ToolDescriptor, ToolSession } from "../mcp/McpToolClient.js";
import { QueryProcessor, type CompletionSource } from "./QueryProcessor.js";

class FakeToolSession implements ToolSession {
    readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];

    constructor(private readonly descriptors: ToolDescriptor[]) {}

    isConnected(): boolean {
        return true;
    }

    getTools(): ToolDescriptor[] {
        return [...this.descriptors];
    }

    async listTools(): Promise<ToolDescriptor[]> {
        return this.getTools();
    }

    async callTool(name: string, args: Record<string, unknown>): Promise<string> {
        this.calls.push({ name, args });
        if (name === "broken") {
            throw new ToolExecutionError("boom", name);
        }
        return `echo: ${String(args.text)}`;
    }
}

type Reply = string | Error | ((messages: readonly ConversationMessage[]) => string);

class ScriptedModel implements CompletionSource {
    readonly seen: ConversationMessage[][] = [];
    readonly toolLists: string[][] = [];

    constructor(private readonly replies: Reply[]) {}

    async generateCompletion(
        messages: readonly ConversationMessage[],
        tools: readonly ToolSummary[],
    ): Promise<string> {
        this.seen.push(messages.map((message) => ({ ...message })));
        this.toolLists.push(tools.map((tool) => tool.name));
        const reply =
            this.replies[Math.min(this.seen.length, this.replies.length) - 1];
        if (reply instanceof Error) {
            throw reply;
        }
        return typeof reply === "function" ? reply(messages) : reply;
    }
}

const tools: ToolDescriptor[] = [
    {
        name: "echo",
        description: "Echo text",
        inputSchema: { type: "object" },
    },
    {
        name: "broken",
        description: "Always fails",
        inputSchema: { type: "object" },
    },
];

function createProcessor(
    model: CompletionSource,
    session: ToolSession = new FakeToolSession(tools),
    maxToolRounds = 5,
    conversationLog = new ConversationLog({ directory: "unused", enabled: false }),
): QueryProcessor {
    return new QueryProcessor({
        tools: session,
        llm: model,
        conversationLog,
        maxToolRounds,
    });
}

describe("QueryProcessor.processQuery", () => {
    test("returns the direct answer when no tool is requested", async () => {
        const model = new ScriptedModel(["Paris."]);
        const messages = await createProcessor(model).processQuery(
            "Capital of France?",
        );

        assert.deepEqual(messages, [
            { role: "user", content: "Capital of France?" },
            { role: "assistant", content: "Paris." },
        ]);
        assert.deepEqual(model.toolLists, [["echo", "broken"]]);
    });

    test("executes a tool call and feeds the result back to the model", async () => {
        const session = new FakeToolSession(tools);
        const model = new ScriptedModel([
            'Checking. <function=echo{"text":"hi"}>',
            "The tool said hi.",
        ]);
        const messages = await createProcessor(model, session).processQuery("say hi");

        assert.deepEqual(messages, [
            { role: "user", content: "say hi" },
            { role: "assistant", content: 'Checking. <function=echo{"text":"hi"}>' },
            { role: "user", content: "Tool 'echo' returned: echo: hi" },
            { role: "assistant", content: "The tool said hi." },
        ]);
        assert.deepEqual(session.calls, [{ name: "echo", args: { text: "hi" } }]);
        assert.equal(model.seen.length, 2);
        assert.deepEqual(model.seen[1], messages.slice(0, 3));
    });

    test("runs every call of a reply in order", async () => {
        const session = new FakeToolSession(tools);
        const model = new ScriptedModel([
            '<function=echo{"text":"a"}> then <function=echo{"text":"b"}>',
            "done",
        ]);
        const messages = await createProcessor(model, session).processQuery("two");

        assert.deepEqual(
            messages.slice(2, 4).map((message) => message.content),
            ["Tool 'echo' returned: echo: a", "Tool 'echo' returned: echo: b"],
        );
        assert.deepEqual(
            session.calls.map((call) => call.args.text),
            ["a", "b"],
        );
    });

    test("reports unknown tools without calling the server", async () => {
        const session = new FakeToolSession(tools);
        const model = new ScriptedModel(["<function=missing{}>", "ok"]);
        const messages = await createProcessor(model, session).processQuery("q");

        assert.equal(
            messages[2].content,
            "Error using tool 'missing': Unknown tool. Available tools: echo, broken",
        );
        assert.equal(session.calls.length, 0);
        assert.equal(messages[3].content, "ok");
    });

    test("reports malformed arguments and tool failures to the model", async () => {
        const model = new ScriptedModel([
            '<function=echo{"text":}> <function=broken{"x":1}>',
            "sorry",
        ]);
        const messages = await createProcessor(model).processQuery("q");

        assert.equal(messages[2].role, "user");
        assert.ok(
            messages[2].content.startsWith(
                "Error using tool 'echo': Invalid tool arguments: ",
            ),
        );
        assert.deepEqual(messages[3], {
            role: "user",
            content: "Error using tool 'broken': boom",
        });
        assert.deepEqual(messages[4], { role: "assistant", content: "sorry" });
    });

    test("stops after the configured number of tool rounds", async () => {
        const session = new FakeToolSession(tools);
        const model = new ScriptedModel(['<function=echo{"text":"again"}>']);
        const messages = await createProcessor(model, session, 2).processQuery("loop");

        assert.equal(model.seen.length, 3);
        assert.equal(session.calls.length, 2);
        assert.equal(messages.length, 6);
        assert.deepEqual(messages[5], {
            role: "assistant",
            content: '<function=echo{"text":"again"}>',
        });
    });

    test("turns a model failure into an apology message", async () => {
        const model = new ScriptedModel([new Error("model down")]);
        const messages = await createProcessor(model).processQuery("q");

        assert.deepEqual(messages, [
            { role: "user", content: "q" },
            {
                role: "assistant",
                content: "I'm sorry, I encountered an error: model down",
            },
        ]);
    });

    test("keeps concurrent conversations separate", async () => {
        const model = new ScriptedModel([
            (messages) => `answer to ${messages[0].content}`,
        ]);
        const processor = createProcessor(model);

        const [first, second] = await Promise.all([
            processor.processQuery("one"),
            processor.processQuery("two"),
        ]);

        assert.deepEqual(first, [
            { role: "user", content: "one" },
            { role: "assistant", content: "answer to one" },
        ]);
        assert.deepEqual(second, [
            { role: "user", content: "two" },
            { role: "assistant", content: "answer to two" },
        ]);
    });

    test("writes the final conversation snapshot to the log directory", async () => {
        const directory = await mkdtemp(path.join(os.tmpdir(), "relay-query-"));
        try {
            const model = new ScriptedModel(['<function=echo{"text":"x"}>', "final"]);
            const processor = createProcessor(
                model,
                new FakeToolSession(tools),
                5,
                new ConversationLog({ directory }),
            );

            const messages = await processor.processQuery("log me", {
                logPrefix: "api",
            });

            const files = await readdir(directory);
            assert.equal(files.length, 1);
            assert.ok(files[0].startsWith("api_"));
            const saved: unknown = JSON.parse(
                await readFile(path.join(directory, files[0]), "utf8"),
            );
            assert.deepEqual(saved, messages);
        } finally {
            await rm(directory, { recursive: true, force: true });
        }
    });
});

describe("QueryProcessor.listTools", () => {
    test("delegates to the tool session", async () => {
        const processor = createProcessor(new ScriptedModel(["ok"]));
        const listed = await processor.listTools();
        assert.deepEqual(
            listed.map((tool) => tool.name),
            ["echo", "broken"],
        );
        assert.equal(processor.isReady(), true);
    });
});
