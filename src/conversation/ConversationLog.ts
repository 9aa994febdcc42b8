import { randomBytes } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../core/Logger.js";
import type { ConversationMessage } from "./messages.js";

export type ConversationLogOptions = {
    directory: string;
    enabled?: boolean;
    now?: () => Date;
    logger?: Logger;
};

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/** Local-time stamp in the `YYYY-MM-DD_HH-MM-SS` shape used for log file names. */
export function formatTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
        `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
    );
}

export interface ConversationLogHandle {
    readonly filePath: string | null;
    write(messages: readonly ConversationMessage[]): Promise<string | null>;
}

/**
 * Writes JSON snapshots of conversations, one file per conversation.
 * Each `write` replaces the previous snapshot of the same conversation.
 */
export class ConversationLog {
    private readonly directory: string;
    private readonly enabled: boolean;
    private readonly now: () => Date;
    private readonly logger: Logger;

    constructor(options: ConversationLogOptions) {
        this.directory = options.directory;
        this.enabled = options.enabled ?? true;
        this.now = options.now ?? (() => new Date());
        this.logger =
            options.logger ?? Logger.getInstance().child("conversation-log");
    }

    isEnabled(): boolean {
        return this.enabled;
    }

    open(prefix: string = "conversation"): ConversationLogHandle {
        if (!this.enabled) {
            return {
                filePath: null,
                write: async () => null,
            };
        }

        const suffix = randomBytes(4).toString("hex");
        const filePath = path.join(
            this.directory,
            `${prefix}_${formatTimestamp(this.now())}_${suffix}.json`,
        );

        return {
            filePath,
            write: (messages) => this.writeSnapshot(filePath, messages),
        };
    }

    private async writeSnapshot(
        filePath: string,
        messages: readonly ConversationMessage[],
    ): Promise<string> {
        const serializable = messages.map((message) => ({
            role: message.role,
            content: message.content,
        }));

        try {
            await mkdir(this.directory, { recursive: true });
            await writeFile(
                filePath,
                JSON.stringify(serializable, null, 2),
                "utf8",
            );
        } catch (error) {
            this.logger.error("Error writing conversation to file", {
                filePath,
                err: error,
            });
            throw error;
        }

        this.logger.debug("Conversation snapshot written", {
            filePath,
            messageCount: serializable.length,
        });
        return filePath;
    }
}
