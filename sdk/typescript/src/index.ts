/**
 * OpenTelemetry exporter for Honeycomb.
 *
 * Usage:
 * ```typescript
 * import { configure, shutdown } from "otel-honeycomb-exporter";
 *
 * configure({
 *   writeKey: process.env.HONEYCOMB_WRITEKEY,
 *   dataset: "my-service",
 *   samplers: [{ type: "fixed", options: { rate: 4 } }],
 *   deterministicSampling: true,
 * });
 *
 * // ... traced code ...
 *
 * // Graceful shutdown
 * await shutdown();
 * ```
 *
 * Or hand {@link HoneycombSpanExporter} to a span processor you build
 * yourself.
 */

import { diag } from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { configFromEnv, type HoneycombExporterOptions } from "./config.js";
import { HoneycombSpanExporter } from "./exporter.js";

/**
 * Options for {@link configure}.
 */
export interface ConfigureOptions extends HoneycombExporterOptions {
  /**
   * Number of spans the batch processor hands to each export. Honeycomb caps
   * event bodies at 100KB and batches at 5MB, so 50 is safe for any events.
   * @default 50
   */
  maxExportBatchSize?: number;

  /**
   * Maximum time in milliseconds to wait before exporting.
   * @default 5000
   */
  scheduledDelayMillis?: number;

  /**
   * Maximum number of spans to queue before dropping.
   * @default 2048
   */
  maxQueueSize?: number;
}

let tracerProvider: NodeTracerProvider | null = null;
let spanExporter: HoneycombSpanExporter | null = null;

/**
 * Register a tracer provider that exports to Honeycomb.
 *
 * Options not given are read from `HONEYCOMB_*` environment variables.
 * Throws a `ConfigurationError` for invalid options.
 */
export function configure(options: ConfigureOptions = {}): HoneycombSpanExporter {
  if (tracerProvider && spanExporter) {
    diag.warn("Honeycomb exporter already configured. Ignoring duplicate configure() call.");
    return spanExporter;
  }

  const { maxExportBatchSize, scheduledDelayMillis, maxQueueSize, ...exporterOptions } = options;
  const exporter = new HoneycombSpanExporter({ ...configFromEnv(), ...exporterOptions });

  tracerProvider = new NodeTracerProvider();
  tracerProvider.addSpanProcessor(
    new BatchSpanProcessor(exporter, {
      maxExportBatchSize: maxExportBatchSize ?? 50,
      scheduledDelayMillis: scheduledDelayMillis ?? 5000,
      maxQueueSize: maxQueueSize ?? 2048,
    })
  );
  tracerProvider.register();
  spanExporter = exporter;

  return exporter;
}

/**
 * Flush remaining spans and shut the tracer provider down.
 */
export async function shutdown(): Promise<void> {
  if (tracerProvider) {
    await tracerProvider.shutdown();
    tracerProvider = null;
  }
  spanExporter = null;
}

export {
  MAX_VALUE_BYTES,
  cleanAttributes,
  mergeAttributes,
  sortAttributes,
  trimLongString,
  type CleanAttributeValue,
  type CleanAttributes,
} from "./attributes.js";
export { MAX_BATCH_BYTES, MAX_EVENT_BYTES, batchBody, chunkEvents, type Batch, type ChunkLimits } from "./chunker.js";
export {
  ConfigurationError,
  DEFAULT_ATTRIBUTE_MAP,
  configFromEnv,
  type AttributeMap,
  type ExporterConfig,
  type HoneycombExporterOptions,
} from "./config.js";
export {
  DecoratorRegistry,
  StaticFieldsDecorator,
  defaultDecoratorRegistry,
  type DecorateOptions,
  type Decorator,
  type DecoratorSpec,
} from "./decorator.js";
export { ExportOutcome, classifyResponse, sendBatch, type SendEvent, type SendListener } from "./delivery.js";
export { assembleEvents, now, toSpanRecord, toWireEvent, type HoneycombEvent, type SpanRecord, type WireEvent } from "./event.js";
export { DeliveryError, HoneycombSpanExporter, exportSpans, initExporter, type InitResult } from "./exporter.js";
export {
  ConsoleHttpClient,
  FetchHttpClient,
  WriteKeyMissingHttpClient,
  type HttpClient,
  type HttpRequest,
  type HttpResponse,
} from "./http.js";
export { defaultJsonCodec, type JsonCodec } from "./json.js";
export {
  FixedSampler,
  SamplerRegistry,
  defaultSamplerRegistry,
  sampleEvents,
  shouldKeep,
  type SampleResult,
  type Sampler,
  type SamplerSpec,
} from "./sampler.js";
export { VERSION } from "./version.js";
