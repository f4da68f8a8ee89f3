/**
 * optional-deps.ts - Loaders for the optional OpenTelemetry SDK packages
 *
 * The SDK and the OTLP exporter are devDependencies: an application that
 * embeds the store brings its own tracing setup, so these may be absent.
 * A missing package yields null; any other load failure is rethrown.
 *
 * Tests vi.mock("./optional-deps") to simulate absent packages, since
 * Vitest cannot intercept a raw CommonJS require().
 */

type SdkTraceNode = typeof import("@opentelemetry/sdk-trace-node");
type ExporterOtlpProto = typeof import("@opentelemetry/exporter-trace-otlp-proto");

function loadOptional<T>(packageName: string, load: () => T): T | null {
  try {
    return load();
  } catch (error) {
    const missing =
      error instanceof Error &&
      "code" in error &&
      error.code === "MODULE_NOT_FOUND" &&
      error.message.includes(packageName);
    if (missing) return null;
    throw error;
  }
}

export function loadSdkTraceNode(): SdkTraceNode | null {
  return loadOptional<SdkTraceNode>("@opentelemetry/sdk-trace-node", () =>
    require("@opentelemetry/sdk-trace-node")
  );
}

export function loadExporterOtlpProto(): ExporterOtlpProto | null {
  return loadOptional<ExporterOtlpProto>("@opentelemetry/exporter-trace-otlp-proto", () =>
    require("@opentelemetry/exporter-trace-otlp-proto")
  );
}
