/**
 * OTel SpanExporter that sends spans to Honeycomb.
 *
 * Each export converts spans to Honeycomb events, runs the configured
 * decorator and samplers, packs the encoded events into batches within
 * Honeycomb's size limits and POSTs them one after another. Retrying a failed
 * export is left to the caller; the result says whether a retry could help.
 */

import type { ExportResult } from "@opentelemetry/core";
import { ExportResultCode } from "@opentelemetry/core";
import type { ReadableSpan, SpanExporter } from "@opentelemetry/sdk-trace-base";
import { cleanAttributes, type CleanAttributes } from "./attributes.js";
import { chunkEvents } from "./chunker.js";
import { resolveConfig, type ExporterConfig, type HoneycombExporterOptions } from "./config.js";
import { decorateEvent } from "./decorator.js";
import { ExportOutcome, firstFailure, sendBatch } from "./delivery.js";
import { assembleEvents, toSpanRecord, toWireEvent, type HoneycombEvent, type SpanRecord } from "./event.js";
import { WriteKeyMissingHttpClient } from "./http.js";
import { defaultJsonCodec, isJsonCodec } from "./json.js";
import { sampleEvents, shouldKeep } from "./sampler.js";

export type InitResult =
  | { status: "ok"; config: ExporterConfig }
  | { status: "ignore"; reason: string };

/**
 * Carries a failed export outcome to the SDK.
 */
export class DeliveryError extends Error {
  readonly retryable: boolean;

  constructor(readonly outcome: ExportOutcome) {
    super(`Honeycomb export ${outcome}`);
    this.name = "DeliveryError";
    this.retryable = outcome === ExportOutcome.FAILED_RETRYABLE;
  }
}

/**
 * Validate options and decide whether the exporter can run.
 *
 * Throws a `ConfigurationError` for invalid options. An unusable JSON codec
 * disables the exporter; a missing write key swaps in a no-op HTTP client.
 */
export function initExporter(options: HoneycombExporterOptions = {}): InitResult {
  const config = resolveConfig(options, defaultJsonCodec);

  if (options.json !== undefined) {
    if (!isJsonCodec(options.json)) {
      const reason = "json codec lacks encode/decode; disabling exporter";
      config.logger.warn(reason);
      return { status: "ignore", reason };
    }
    config.json = options.json;
  }

  if (config.writeKey === null || config.writeKey === "") {
    config.logger.warn("write key absent; nothing will be sent to Honeycomb");
    config.httpClient = new WriteKeyMissingHttpClient();
  }

  return { status: "ok", config };
}

/**
 * Assemble, decorate and sample events for spans sharing one resource.
 */
export function spansToEvents(
  spans: readonly SpanRecord[],
  resourceAttributes: CleanAttributes,
  config: ExporterConfig
): HoneycombEvent[] {
  const assembled = spans.flatMap((span) =>
    assembleEvents(span, resourceAttributes, {
      attributeMap: config.attributeMap,
      samplerateKey: config.samplerateKey,
      maxValueBytes: config.maxValueBytes,
      logger: config.logger,
    })
  );

  const { decorator } = config;
  const decorated = decorator
    ? assembled.map((event) =>
        decorateEvent(event, decorator, { maxValueBytes: config.maxValueBytes, samplerateKey: config.samplerateKey })
      )
    : assembled;
  const sampled = sampleEvents(decorated, config.samplers, config.logger);
  return config.deterministicSampling ? sampled.filter(shouldKeep) : sampled;
}

/**
 * Encode, chunk and send events; the first failed batch decides the outcome.
 */
export async function deliverEvents(events: readonly HoneycombEvent[], config: ExporterConfig): Promise<ExportOutcome> {
  const encoded = events.map((event) => config.json.encode(toWireEvent(event)));
  const batches = chunkEvents(
    encoded,
    {
      maxEventBytes: config.maxEventBytes,
      maxBatchBytes: config.maxBatchBytes,
      maxEvents: config.batchSize,
    },
    config.logger
  );

  const outcomes: ExportOutcome[] = [];
  for (const batch of batches) {
    outcomes.push(await sendBatch(batch, config));
  }
  return firstFailure(outcomes);
}

/**
 * Export spans that share a resource.
 */
export async function exportSpans(
  spans: readonly SpanRecord[],
  resourceAttributes: unknown,
  config: ExporterConfig
): Promise<ExportOutcome> {
  if (spans.length === 0) {
    return ExportOutcome.OK;
  }
  return deliverEvents(spansToEvents(spans, cleanAttributes(resourceAttributes), config), config);
}

/**
 * Exports spans to Honeycomb's batch events API.
 */
export class HoneycombSpanExporter implements SpanExporter {
  private readonly init: InitResult;
  private shutdown_flag = false;

  constructor(options: HoneycombExporterOptions = {}) {
    this.init = initExporter(options);
  }

  /**
   * Whether the exporter will send anything.
   */
  get enabled(): boolean {
    return this.init.status === "ok";
  }

  export(spans: ReadableSpan[], resultCallback: (result: ExportResult) => void): void {
    const init = this.init;
    if (this.shutdown_flag || init.status === "ignore") {
      resultCallback({ code: ExportResultCode.SUCCESS });
      return;
    }

    this.exportReadable(spans, init.config).then(
      (outcome) => resultCallback(toExportResult(outcome)),
      (err: unknown) => {
        // sendBatch never rejects, so this is a bug in a codec, decorator or sampler
        init.config.logger.warn(`export failed: ${String(err)}`);
        resultCallback({
          code: ExportResultCode.FAILED,
          error: err instanceof Error ? err : new Error(String(err)),
        });
      }
    );
  }

  async shutdown(): Promise<void> {
    this.shutdown_flag = true;
  }

  async forceFlush(): Promise<void> {
    // Nothing is queued here; the span processor owns buffering.
  }

  private async exportReadable(spans: ReadableSpan[], config: ExporterConfig): Promise<ExportOutcome> {
    if (spans.length === 0) {
      return ExportOutcome.OK;
    }

    const resources = new Map<ReadableSpan["resource"], CleanAttributes>();
    const events = spans.flatMap((span) => {
      let resourceAttributes = resources.get(span.resource);
      if (!resourceAttributes) {
        resourceAttributes = cleanAttributes(span.resource.attributes);
        resources.set(span.resource, resourceAttributes);
      }
      return spansToEvents([toSpanRecord(span)], resourceAttributes, config);
    });

    return deliverEvents(events, config);
  }
}

function toExportResult(outcome: ExportOutcome): ExportResult {
  if (outcome === ExportOutcome.OK || outcome === ExportOutcome.IGNORE) {
    return { code: ExportResultCode.SUCCESS };
  }
  return { code: ExportResultCode.FAILED, error: new DeliveryError(outcome) };
}
