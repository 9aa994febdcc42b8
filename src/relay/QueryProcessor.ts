import { Logger } from "../core/Logger.js";
import { errorMessage } from "../core/errors.js";
import type {
    ConversationLog,
    ConversationLogHandle,
} from "../conversation/ConversationLog.js";
import {
    createAssistantMessage,
    createUserMessage,
    type ConversationMessage,
} from "../conversation/messages.js";
import {
    parseFunctionArguments,
    parseFunctionCalls,
    type FunctionCall,
} from "../llm/function-calls.js";
import type { ToolSummary } from "../llm/LanguageModelClient.js";
import type { ToolDescriptor, ToolSession } from "../mcp/McpToolClient.js";

/** The slice of the language model client the pipeline depends on. */
export interface CompletionSource {
    generateCompletion(
        messages: readonly ConversationMessage[],
        tools: readonly ToolSummary[],
    ): Promise<string>;
}

export type QueryProcessorOptions = {
    tools: ToolSession;
    llm: CompletionSource;
    conversationLog: ConversationLog;
    maxToolRounds: number;
    logPrefix?: string;
};

export type ProcessQueryOptions = {
    logPrefix?: string;
};

/**
 * Runs one query through the model, executing any inline tool calls against
 * the MCP session and feeding their results back until the model answers
 * without calling a tool or the round limit is reached.
 */
export class QueryProcessor {
    private readonly tools: ToolSession;
    private readonly llm: CompletionSource;
    private readonly conversationLog: ConversationLog;
    private readonly maxToolRounds: number;
    private readonly logPrefix: string;
    private readonly logger = Logger.getInstance().child("query");

    constructor(options: QueryProcessorOptions) {
        this.tools = options.tools;
        this.llm = options.llm;
        this.conversationLog = options.conversationLog;
        this.maxToolRounds = Math.max(1, options.maxToolRounds);
        this.logPrefix = options.logPrefix ?? "conversation";
    }

    isReady(): boolean {
        return this.tools.isConnected();
    }

    getCachedTools(): ToolDescriptor[] {
        return this.tools.getTools();
    }

    listTools(): Promise<ToolDescriptor[]> {
        return this.tools.listTools();
    }

    async processQuery(
        query: string,
        options: ProcessQueryOptions = {},
    ): Promise<ConversationMessage[]> {
        this.logger.info(`Processing query: ${query}`);

        const messages: ConversationMessage[] = [createUserMessage(query)];
        const log = this.conversationLog.open(options.logPrefix ?? this.logPrefix);

        try {
            await this.runConversation(messages, log);
        } catch (error) {
            this.logger.error("Error processing query", error);
            messages.push(
                createAssistantMessage(
                    `I'm sorry, I encountered an error: ${errorMessage(error)}`,
                ),
            );
        }

        return messages;
    }

    private async runConversation(
        messages: ConversationMessage[],
        log: ConversationLogHandle,
    ): Promise<void> {
        const available = this.tools.getTools();
        const knownNames = new Set(available.map((tool) => tool.name));

        for (let round = 1; ; round += 1) {
            const reply = await this.llm.generateCompletion(messages, available);
            messages.push(createAssistantMessage(reply));
            await log.write(messages);

            const calls = parseFunctionCalls(reply);
            if (calls.length === 0) {
                return;
            }
            if (round > this.maxToolRounds) {
                this.logger.warn(
                    `Stopping after ${this.maxToolRounds} tool rounds with ${calls.length} call(s) pending`,
                );
                return;
            }

            for (const call of calls) {
                messages.push(await this.executeCall(call, knownNames));
                await log.write(messages);
            }
        }
    }

    private async executeCall(
        call: FunctionCall,
        knownNames: ReadonlySet<string>,
    ): Promise<ConversationMessage> {
        this.logger.info(
            `Found function call: ${call.name} with args ${call.rawArguments}`,
        );

        try {
            if (knownNames.size > 0 && !knownNames.has(call.name)) {
                throw new Error(
                    `Unknown tool. Available tools: ${[...knownNames].join(", ")}`,
                );
            }
            const args = parseFunctionArguments(call.rawArguments);
            const result = await this.tools.callTool(call.name, args);
            return createUserMessage(`Tool '${call.name}' returned: ${result}`);
        } catch (error) {
            this.logger.error(`Error calling tool ${call.name}`, error);
            return createUserMessage(
                `Error using tool '${call.name}': ${errorMessage(error)}`,
            );
        }
    }
}
