/**
 * tracing/index.ts - OpenTelemetry initialization
 *
 * What this file does:
 * Sets up OpenTelemetry tracing so every store operation (ensure, insert,
 * search, ...) shows up as a span with its collection, outcome and timing.
 *
 * Opt-in by default:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the OTel API
 * returns a "no-op" tracer that does nothing.
 *
 * Graceful degradation:
 * The SDK packages (@opentelemetry/sdk-trace-node, @opentelemetry/exporter-trace-otlp-proto)
 * are optional and loaded via dynamic require(). When absent, initialization is
 * skipped and the OTel API's no-op implementations take over.
 *
 * Exporter options:
 * - console (default): Prints spans to stdout, useful for development
 * - otlp: Sends spans via OTLP protocol to a collector (Jaeger, Datadog Agent, etc.)
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { createLogger } from "../logger";
import { loadSdkTraceNode, loadExporterOtlpProto } from "./optional-deps";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

const SERVICE_NAME = "weaviate-bridge";

const log = createLogger({ stderr: true }).child({ component: "tracing" });

const isTracingEnabled = process.env.OTEL_TRACING_ENABLED === "true";

/**
 * Exporter type: "console" for development, "otlp" for collectors.
 * "otlp" also needs OTEL_EXPORTER_OTLP_ENDPOINT.
 */
const exporterType = process.env.OTEL_EXPORTER_TYPE || "console";

function createSpanExporter(): SpanExporter {
  if (exporterType === "otlp") {
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    // Strip trailing slashes to avoid double-slash in URL
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    log.info({ endpoint: base }, "using OTLP exporter");
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }

  log.info("using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Registers a NodeTracerProvider as the global provider.
 *
 * Spans are exported immediately (SimpleSpanProcessor) since the main
 * consumer is a short-lived CLI.
 */
if (isTracingEnabled) {
  if (!sdkTraceNode) {
    log.warn(
      "OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed; tracing will be no-op"
    );
  } else {
    const exporter = createSpanExporter();
    const provider = new sdkTraceNode.NodeTracerProvider({
      spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(exporter)],
    });
    provider.register();
    log.info({ service: SERVICE_NAME }, "tracing enabled");

    // Flush pending spans before the process exits
    const shutdown = async () => {
      try {
        await provider.shutdown();
      } catch (error) {
        log.error({ err: error }, "error shutting down tracing");
      }
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);
  }
}

/**
 * Get a tracer for creating spans.
 *
 * Returns the tracer from whatever TracerProvider is registered globally,
 * or a no-op tracer when tracing is disabled.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

export { isTracingEnabled };
