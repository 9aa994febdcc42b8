import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { validator } from "hono/validator";
import { z } from "zod";
import { Logger } from "./core/Logger.js";
import { ErrorHandler } from "./core/ErrorHandler.js";
import {
    errorMessage,
    httpStatusForError,
    toPublicErrorPayload,
} from "./core/errors.js";
import type { ConversationMessage } from "./conversation/messages.js";
import type { ToolDescriptor } from "./mcp/McpToolClient.js";
import { recordRequestMetric, withSpan } from "./observability/telemetry.js";

const QueryRequestSchema = z.object({
    query: z
        .string({ required_error: "query is required" })
        .trim()
        .min(1, "query must not be empty"),
});

const logger = Logger.getInstance().child("http");

const queryBodyValidator = validator("json", (value, c) => {
    const parsed = QueryRequestSchema.safeParse(value);
    if (!parsed.success) {
        return c.json(
            {
                detail: parsed.error.issues
                    .map((issue) => issue.message)
                    .join("; "),
            },
            400,
        );
    }
    return parsed.data;
});

export type RelayServiceLike = {
    processQuery(
        query: string,
        options?: { logPrefix?: string },
    ): Promise<ConversationMessage[]>;
    listTools(): Promise<ToolDescriptor[]>;
    getCachedTools(): ToolDescriptor[];
    isReady(): boolean;
};

type HttpAppDependencies = {
    relay: RelayServiceLike;
    isDiscordRunning: () => boolean;
};

export function createHttpApp(deps: HttpAppDependencies) {
    const { relay, isDiscordRunning } = deps;
    const app = new Hono();

    app.use(
        "*",
        cors({
            origin: "*",
        }),
    );

    app.use("*", async (c, next) => {
        const startedAt = Date.now();
        const method = c.req.method;
        const route = c.req.path;
        let status: "success" | "error" = "success";

        try {
            await withSpan(
                "http.request",
                {
                    "http.method": method,
                    "http.route": route,
                },
                async (span) => {
                    await next();
                    span.setAttribute("http.status_code", c.res.status);
                },
            );
        } catch (error) {
            status = "error";
            throw error;
        } finally {
            recordRequestMetric(
                {
                    "http.method": method,
                    "http.route": route,
                    "http.status_code":
                        c.res.status || (status === "error" ? 500 : 200),
                    "relay.status": status,
                },
                Date.now() - startedAt,
            );
        }
    });

    app.onError((error, c) => {
        if (error instanceof HTTPException) {
            return c.json({ detail: error.message }, error.status);
        }

        const normalized = ErrorHandler.report(error, {
            path: c.req.path,
            method: c.req.method,
        });
        return c.json(
            { detail: toPublicErrorPayload(normalized).message },
            httpStatusForError(normalized),
        );
    });

    app.post("/query", queryBodyValidator, async (c) => {
        const { query } = c.req.valid("json");
        const messages = await relay.processQuery(query, { logPrefix: "api" });
        return c.json({ messages }, 200);
    });

    app.get("/tools", async (c) => {
        try {
            const tools = await relay.listTools();
            return c.json(
                {
                    tools: tools.map((tool) => ({
                        name: tool.name,
                        description: tool.description,
                        input_schema: tool.inputSchema,
                    })),
                },
                200,
            );
        } catch (error) {
            logger.error("Listing tools failed", error);
            return c.json(
                { detail: errorMessage(error) },
                httpStatusForError(error),
            );
        }
    });

    app.get("/health", (c) => {
        return c.json(
            {
                status: "ok",
                mcp: relay.isReady() ? "connected" : "disconnected",
                discord: isDiscordRunning() ? "running" : "stopped",
                tools: relay.getCachedTools().length,
            },
            200,
        );
    });

    app.all("*", (c) => {
        return c.text(
            "MCP Chat Relay\n\nEndpoints:\n- POST /query - Run a query through the model and MCP tools\n- GET /tools - List MCP tools\n- GET /health - Health check",
            404,
        );
    });

    return app;
}

export type AppType = ReturnType<typeof createHttpApp>;
