import { z } from "zod";
import { ValidationError } from "./ErrorHandler.js";

export const DEFAULT_MCP_ARGS: readonly string[] = [
    "-y",
    "web3-research-mcp@latest",
];

export const PERSONAS = ["assistant", "general", "researcher"] as const;
export type Persona = (typeof PERSONAS)[number];

const booleanFlag = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((value, ctx) => {
            if (value === undefined || value.trim() === "") {
                return fallback;
            }
            const normalized = value.trim().toLowerCase();
            if (["1", "true", "yes"].includes(normalized)) {
                return true;
            }
            if (["0", "false", "no"].includes(normalized)) {
                return false;
            }
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Expected a boolean flag, received '${value}'`,
            });
            return z.NEVER;
        });

const listOf = (fallback: readonly string[]) =>
    z
        .string()
        .optional()
        .transform((value) => {
            if (value === undefined || value.trim() === "") {
                return [...fallback];
            }
            return value
                .split(",")
                .map((item) => item.trim())
                .filter((item) => item.length > 0);
        });

const optionalText = z
    .string()
    .optional()
    .transform((value) => {
        const trimmed = value?.trim();
        return trimmed ? trimmed : undefined;
    });

const EnvSchema = z.object({
    GROQ_API_KEY: optionalText,
    GROQ_MODEL: z.string().trim().min(1).default("llama-3-8b-8192"),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_PERSONA: z.enum(PERSONAS).default("assistant"),
    MCP_COMMAND: z.string().trim().min(1).default("npx"),
    MCP_ARGS: listOf(DEFAULT_MCP_ARGS),
    MCP_SERVER_SCRIPT: optionalText,
    MAX_TOOL_ROUNDS: z.coerce.number().int().min(1).max(50).default(5),
    DISCORD_TOKEN: optionalText,
    DISCORD_ENABLED: booleanFlag(true),
    DISCORD_COMMAND_PREFIX: z.string().min(1).default("!"),
    DISCORD_REQUIRE_MENTION: booleanFlag(false),
    HTTP_HOST: z.string().trim().min(1).default("0.0.0.0"),
    HTTP_PORT: z.coerce.number().int().min(1).max(65535).optional(),
    PORT: z.coerce.number().int().min(1).max(65535).optional(),
    CONVERSATIONS_DIR: z.string().trim().min(1).default("conversations"),
    CONVERSATION_LOG_ENABLED: booleanFlag(true),
});

export interface LanguageModelConfig {
    apiKey?: string;
    model: string;
    maxTokens: number;
    temperature: number;
    persona: Persona;
}

export interface McpServerConfig {
    command: string;
    args: string[];
    serverScriptPath?: string;
}

export interface DiscordConfig {
    token?: string;
    enabled: boolean;
    commandPrefix: string;
    requireMention: boolean;
}

export interface HttpConfig {
    host: string;
    port: number;
}

export interface ConversationConfig {
    directory: string;
    logEnabled: boolean;
}

export interface RelayConfig {
    llm: LanguageModelConfig;
    mcp: McpServerConfig;
    discord: DiscordConfig;
    http: HttpConfig;
    conversations: ConversationConfig;
    maxToolRounds: number;
}

type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Builds the relay configuration from an environment map.
 * Blank values count as unset so that `.env` placeholders fall back to defaults.
 */
export function loadRelayConfig(env: EnvSource = process.env): RelayConfig {
    const blankToUndefined = Object.fromEntries(
        Object.keys(EnvSchema.shape).map((key) => {
            const raw = env[key];
            return [key, raw === undefined || raw.trim() === "" ? undefined : raw];
        }),
    );

    const parsed = EnvSchema.safeParse(blankToUndefined);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`,
        );
        throw new ValidationError(
            `Invalid configuration: ${issues.join("; ")}`,
            { issues },
        );
    }

    const values = parsed.data;
    return {
        llm: {
            apiKey: values.GROQ_API_KEY,
            model: values.GROQ_MODEL,
            maxTokens: values.LLM_MAX_TOKENS,
            temperature: values.LLM_TEMPERATURE,
            persona: values.LLM_PERSONA,
        },
        mcp: {
            command: values.MCP_COMMAND,
            args: values.MCP_ARGS,
            serverScriptPath: values.MCP_SERVER_SCRIPT,
        },
        discord: {
            token: values.DISCORD_TOKEN,
            enabled: values.DISCORD_ENABLED,
            commandPrefix: values.DISCORD_COMMAND_PREFIX,
            requireMention: values.DISCORD_REQUIRE_MENTION,
        },
        http: {
            host: values.HTTP_HOST,
            port: values.HTTP_PORT ?? values.PORT ?? 8000,
        },
        conversations: {
            directory: values.CONVERSATIONS_DIR,
            logEnabled: values.CONVERSATION_LOG_ENABLED,
        },
        maxToolRounds: values.MAX_TOOL_ROUNDS,
    };
}

export class ConfigManager {
    private static instance: ConfigManager;
    private readonly config: RelayConfig;

    private constructor() {
        this.config = loadRelayConfig();
    }

    static getInstance(): ConfigManager {
        if (!ConfigManager.instance) {
            ConfigManager.instance = new ConfigManager();
        }
        return ConfigManager.instance;
    }

    getConfig(): RelayConfig {
        return structuredClone(this.config);
    }

    isDiscordEnabled(): boolean {
        return this.config.discord.enabled && Boolean(this.config.discord.token);
    }
}
