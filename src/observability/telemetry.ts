import {
    SpanStatusCode,
    metrics,
    trace,
    type Attributes,
    type Counter,
    type Histogram,
    type Span,
} from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { PrometheusExporter } from "@opentelemetry/exporter-prometheus";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { getModuleLogger, parseBoolean } from "./logger.js";

const logger = getModuleLogger("telemetry");
const serviceName = process.env.OTEL_SERVICE_NAME || "mcp-chat-relay";
const serviceVersion = process.env.npm_package_version || "0.0.0";
const deploymentEnvironment = process.env.NODE_ENV || "development";

let sdk: NodeSDK | null = null;
let initialized = false;

function parseHeaders(
    source: string | undefined,
): Record<string, string> | undefined {
    if (!source || source.trim().length === 0) {
        return undefined;
    }

    const entries = source
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
        .map((entry) => {
            const separator = entry.indexOf("=");
            if (separator < 1) {
                return null;
            }
            const key = entry.slice(0, separator).trim();
            const value = entry.slice(separator + 1).trim();
            if (!key || !value) {
                return null;
            }
            return [key, value] as const;
        })
        .filter((item): item is readonly [string, string] => item !== null);

    if (entries.length === 0) {
        return undefined;
    }

    return Object.fromEntries(entries);
}

function parsePort(value: string | undefined, fallback: number): number {
    if (!value) {
        return fallback;
    }

    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        return fallback;
    }
    return parsed;
}

export async function initializeTelemetry(): Promise<void> {
    if (initialized) {
        return;
    }

    initialized = true;
    if (!parseBoolean(process.env.OTEL_ENABLED, true)) {
        logger.info("OpenTelemetry disabled by OTEL_ENABLED=false");
        return;
    }

    const traceEndpoint =
        process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT ||
        "http://localhost:4318/v1/traces";
    const prometheusPort = parsePort(process.env.OTEL_PROMETHEUS_PORT, 9464);
    const prometheusEndpoint = process.env.OTEL_PROMETHEUS_ENDPOINT || "/metrics";

    sdk = new NodeSDK({
        resource: resourceFromAttributes({
            "service.name": serviceName,
            "service.version": serviceVersion,
            "deployment.environment": deploymentEnvironment,
        }),
        traceExporter: new OTLPTraceExporter({
            url: traceEndpoint,
            headers: parseHeaders(process.env.OTEL_EXPORTER_OTLP_HEADERS),
        }),
        metricReader: new PrometheusExporter({
            port: prometheusPort,
            endpoint: prometheusEndpoint,
        }),
        instrumentations: [getNodeAutoInstrumentations()],
    });

    sdk.start();
    logger.info(
        {
            serviceName,
            traceEndpoint,
            prometheusPort,
            prometheusEndpoint,
        },
        "OpenTelemetry initialized",
    );
}

export async function shutdownTelemetry(): Promise<void> {
    if (!sdk) {
        return;
    }
    const current = sdk;
    sdk = null;
    try {
        await current.shutdown();
        logger.info("OpenTelemetry shutdown complete");
    } catch (error) {
        logger.warn({ err: error }, "OpenTelemetry shutdown encountered exporter errors");
    }
}

type RuntimeInstruments = {
    requestCounter: Counter;
    requestDuration: Histogram;
    completionCounter: Counter;
    completionDuration: Histogram;
    toolCallCounter: Counter;
    toolCallDuration: Histogram;
};

let instruments: RuntimeInstruments | null = null;

function getRuntimeInstruments(): RuntimeInstruments {
    if (instruments) {
        return instruments;
    }

    const meter = metrics.getMeter(serviceName);
    instruments = {
        requestCounter: meter.createCounter("relay_requests_total", {
            description: "Count of incoming HTTP requests.",
        }),
        requestDuration: meter.createHistogram("relay_request_duration_ms", {
            unit: "ms",
            description: "Duration of incoming HTTP requests in milliseconds.",
        }),
        completionCounter: meter.createCounter("relay_completions_total", {
            description: "Count of chat completions requested from the model.",
        }),
        completionDuration: meter.createHistogram(
            "relay_completion_duration_ms",
            {
                unit: "ms",
                description: "Duration of chat completions in milliseconds.",
            },
        ),
        toolCallCounter: meter.createCounter("relay_tool_calls_total", {
            description: "Count of tool calls forwarded to the MCP server.",
        }),
        toolCallDuration: meter.createHistogram("relay_tool_call_duration_ms", {
            unit: "ms",
            description: "Duration of MCP tool calls in milliseconds.",
        }),
    };
    return instruments;
}

export function recordRequestMetric(
    attributes: Attributes,
    durationMs: number,
): void {
    const { requestCounter, requestDuration } = getRuntimeInstruments();
    requestCounter.add(1, attributes);
    requestDuration.record(durationMs, attributes);
}

export function recordCompletionMetric(
    attributes: Attributes,
    durationMs: number,
): void {
    const { completionCounter, completionDuration } = getRuntimeInstruments();
    completionCounter.add(1, attributes);
    completionDuration.record(durationMs, attributes);
}

export function recordToolCallMetric(
    attributes: Attributes,
    durationMs: number,
): void {
    const { toolCallCounter, toolCallDuration } = getRuntimeInstruments();
    toolCallCounter.add(1, attributes);
    toolCallDuration.record(durationMs, attributes);
}

export async function withSpan<T>(
    name: string,
    attributes: Attributes,
    work: (span: Span) => Promise<T>,
): Promise<T> {
    return trace.getTracer(serviceName).startActiveSpan(
        name,
        { attributes },
        async (span): Promise<T> => {
            try {
                const result = await work(span);
                span.setStatus({ code: SpanStatusCode.OK });
                return result;
            } catch (error) {
                span.recordException(
                    error instanceof Error ? error : new Error(String(error)),
                );
                span.setStatus({
                    code: SpanStatusCode.ERROR,
                    message: error instanceof Error ? error.message : String(error),
                });
                throw error;
            } finally {
                span.end();
            }
        },
    );
}
