/**
 * Sends batches to the Honeycomb batch API and classifies the reply.
 *
 * Nothing here retries: the outcome tells the caller whether sending the same
 * batch again could help.
 */

import { batchBody, type Batch } from "./chunker.js";
import type { ExporterConfig } from "./config.js";
import type { HttpResponse } from "./http.js";
import { USER_AGENT } from "./version.js";

export const ExportOutcome = {
  OK: "ok",
  FAILED_RETRYABLE: "failed_retryable",
  FAILED_NOT_RETRYABLE: "failed_not_retryable",
  /** The exporter is disabled. */
  IGNORE: "ignore",
} as const;

export type ExportOutcome = (typeof ExportOutcome)[keyof typeof ExportOutcome];

/**
 * Progress of one batch send, reported to `onSend`.
 */
export type SendEvent =
  | { type: "start"; count: number }
  | { type: "success"; count: number; ms: number }
  | { type: "failure"; count: number; ms: number; outcome: ExportOutcome };

export type SendListener = (event: SendEvent) => void;

export type DeliveryConfig = Pick<
  ExporterConfig,
  "apiEndpoint" | "dataset" | "writeKey" | "httpClient" | "json" | "logger" | "onSend"
>;

/**
 * First non-ok outcome, or ok.
 */
export function firstFailure(outcomes: Iterable<ExportOutcome>): ExportOutcome {
  for (const outcome of outcomes) {
    if (outcome !== ExportOutcome.OK) {
      return outcome;
    }
  }
  return ExportOutcome.OK;
}

export function batchUrl(config: Pick<ExporterConfig, "apiEndpoint" | "dataset">): string {
  return `${config.apiEndpoint}/1/batch/${encodeURIComponent(config.dataset)}`;
}

function itemOutcome(item: unknown): ExportOutcome {
  if (typeof item === "object" && item !== null && "status" in item) {
    if (item.status === 202) return ExportOutcome.OK;
    if (item.status === 400) return ExportOutcome.FAILED_NOT_RETRYABLE;
  }
  return ExportOutcome.FAILED_RETRYABLE;
}

function batchReplyOutcome(body: string, config: DeliveryConfig): ExportOutcome {
  let replies: unknown;
  try {
    replies = config.json.decode(body);
  } catch (err) {
    config.logger.warn(`could not decode batch reply: ${String(err)}; failing batch`);
    return ExportOutcome.FAILED_RETRYABLE;
  }

  if (!Array.isArray(replies)) {
    config.logger.warn("batch reply is not an array; failing batch");
    return ExportOutcome.FAILED_RETRYABLE;
  }

  const outcome = firstFailure(replies.map(itemOutcome));
  if (outcome !== ExportOutcome.OK) {
    config.logger.warn(`upstream rejected events in batch (${outcome})`);
  }
  return outcome;
}

/**
 * Classify Honeycomb's reply to one batch.
 */
export function classifyResponse(response: HttpResponse, config: DeliveryConfig): ExportOutcome {
  const { status } = response;

  if (status === 204) {
    return ExportOutcome.OK;
  }
  if (status === 200) {
    return batchReplyOutcome(response.body, config);
  }
  if (status === 401) {
    config.logger.warn("write key incorrect for api endpoint; got 401");
    return ExportOutcome.FAILED_NOT_RETRYABLE;
  }
  if (status >= 500) {
    config.logger.warn(`upstream reports ${status}; failing batch`);
    return ExportOutcome.FAILED_RETRYABLE;
  }

  config.logger.warn(`upstream reports ${status}; dropping batch`);
  return ExportOutcome.FAILED_NOT_RETRYABLE;
}

function notify(config: DeliveryConfig, event: SendEvent): void {
  if (!config.onSend) return;
  try {
    config.onSend(event);
  } catch (err) {
    config.logger.warn(`send listener threw ${String(err)}`);
  }
}

/**
 * POST one batch and classify the result. Never rejects.
 *
 * `onSend` hears `start` before the request and `success` or `failure`, with
 * the elapsed milliseconds, once the reply is classified.
 */
export async function sendBatch(batch: Batch, config: DeliveryConfig): Promise<ExportOutcome> {
  const count = batch.events.length;
  const started = performance.now();
  notify(config, { type: "start", count });

  const outcome = await postBatch(batch, config);

  const ms = performance.now() - started;
  config.logger.debug(`sent batch of ${count} events in ${ms.toFixed(1)}ms (${outcome})`);
  notify(
    config,
    outcome === ExportOutcome.OK ? { type: "success", count, ms } : { type: "failure", count, ms, outcome }
  );
  return outcome;
}

async function postBatch(batch: Batch, config: DeliveryConfig): Promise<ExportOutcome> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "User-Agent": USER_AGENT,
    "X-Honeycomb-Team": config.writeKey ?? "",
  };

  let response: HttpResponse;
  try {
    response = await config.httpClient.request({
      method: "POST",
      url: batchUrl(config),
      headers,
      body: batchBody(batch),
    });
  } catch (err) {
    config.logger.warn(`batch send failed: ${String(err)}`);
    return ExportOutcome.FAILED_RETRYABLE;
  }

  return classifyResponse(response, config);
}
