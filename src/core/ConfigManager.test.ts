import assert from "node:assert/strict";
import test from "node:test";
import { AppError, AppErrorCode } from "./errors.js";
import { ConfigManager, loadRelayConfig } from "./ConfigManager.js";

test("loadRelayConfig applies defaults for an empty environment", () => {
    const config = loadRelayConfig({});

    assert.equal(config.llm.apiKey, undefined);
    assert.equal(config.llm.model, "llama-3-8b-8192");
    assert.equal(config.llm.maxTokens, 1000);
    assert.equal(config.llm.temperature, 0.7);
    assert.equal(config.llm.persona, "assistant");
    assert.deepEqual(config.mcp, {
        command: "npx",
        args: ["-y", "web3-research-mcp@latest"],
        serverScriptPath: undefined,
    });
    assert.deepEqual(config.discord, {
        token: undefined,
        enabled: true,
        commandPrefix: "!",
        requireMention: false,
    });
    assert.deepEqual(config.http, { host: "0.0.0.0", port: 8000 });
    assert.deepEqual(config.conversations, {
        directory: "conversations",
        logEnabled: true,
    });
    assert.equal(config.maxToolRounds, 5);
});

test("loadRelayConfig reads overrides and splits MCP args", () => {
    const config = loadRelayConfig({
        GROQ_API_KEY: "test-key",
        GROQ_MODEL: "test-model",
        LLM_MAX_TOKENS: "256",
        MCP_COMMAND: "node",
        MCP_ARGS: " server.js , --verbose ",
        DISCORD_TOKEN: "test-token",
        DISCORD_REQUIRE_MENTION: "yes",
        PORT: "9000",
        CONVERSATION_LOG_ENABLED: "false",
        MAX_TOOL_ROUNDS: "2",
    });

    assert.equal(config.llm.apiKey, "test-key");
    assert.equal(config.llm.model, "test-model");
    assert.equal(config.llm.maxTokens, 256);
    assert.deepEqual(config.mcp.args, ["server.js", "--verbose"]);
    assert.equal(config.mcp.command, "node");
    assert.equal(config.discord.token, "test-token");
    assert.equal(config.discord.requireMention, true);
    assert.equal(config.http.port, 9000);
    assert.equal(config.conversations.logEnabled, false);
    assert.equal(config.maxToolRounds, 2);
});

test("loadRelayConfig prefers HTTP_PORT over PORT and treats blanks as unset", () => {
    const config = loadRelayConfig({
        HTTP_PORT: "8100",
        PORT: "9000",
        GROQ_API_KEY: "   ",
        GROQ_MODEL: "",
    });

    assert.equal(config.http.port, 8100);
    assert.equal(config.llm.apiKey, undefined);
    assert.equal(config.llm.model, "llama-3-8b-8192");
});

test("loadRelayConfig rejects invalid values with a validation error", () => {
    assert.throws(
        () => loadRelayConfig({ DISCORD_REQUIRE_MENTION: "maybe" }),
        (error: unknown) => {
            assert.ok(error instanceof AppError);
            assert.equal(error.code, AppErrorCode.Validation);
            assert.match(error.message, /DISCORD_REQUIRE_MENTION/);
            return true;
        },
    );
    assert.throws(() => loadRelayConfig({ LLM_PERSONA: "pirate" }), /LLM_PERSONA/);
    assert.throws(() => loadRelayConfig({ HTTP_PORT: "70000" }), /HTTP_PORT/);
});

test("ConfigManager.getConfig hands out copies that cannot change the shared config", () => {
    const manager = ConfigManager.getInstance();
    const original = manager.getConfig();

    const copy = manager.getConfig();
    copy.llm.model = "changed-model";
    copy.mcp.args.push("--extra");
    copy.discord.commandPrefix = "?";

    assert.deepEqual(manager.getConfig(), original);
});
