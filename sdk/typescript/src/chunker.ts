/**
 * Packs encoded events into batches within Honeycomb's batch API limits.
 */

import { Buffer } from "node:buffer";
import { diag, type DiagLogger } from "@opentelemetry/api";

/** Largest accepted event body, in bytes. */
export const MAX_EVENT_BYTES = 102_400;

/** Largest accepted batch body, in bytes. */
export const MAX_BATCH_BYTES = 5_242_880;

export interface ChunkLimits {
  maxEventBytes?: number;
  maxBatchBytes?: number;
  /** Close a batch once it holds this many events. */
  maxEvents?: number;
}

export interface Batch {
  events: readonly string[];
  /** Size of {@link batchBody}, brackets and commas included. */
  byteLength: number;
}

/**
 * The batch as a JSON array.
 */
export function batchBody(batch: Batch): string {
  return `[${batch.events.join(",")}]`;
}

/**
 * Split encoded events into batches, in order.
 *
 * Events over `maxEventBytes` are dropped with a warning. An empty input
 * yields no batches.
 */
export function chunkEvents(
  encoded: Iterable<string>,
  limits: ChunkLimits = {},
  logger: DiagLogger = diag
): Batch[] {
  const maxEventBytes = limits.maxEventBytes ?? MAX_EVENT_BYTES;
  const maxBatchBytes = limits.maxBatchBytes ?? MAX_BATCH_BYTES;
  const maxEvents = limits.maxEvents ?? Infinity;

  const finished: Batch[] = [];
  let events: string[] = [];
  // "[" up front; each event then brings its own "," or "]"
  let byteLength = 1;

  for (const event of encoded) {
    const length = Buffer.byteLength(event, "utf8");

    if (length > maxEventBytes) {
      logger.warn(`event exceeds ${maxEventBytes} bytes; dropped`);
      continue;
    }

    if (events.length > 0 && (byteLength + length + 1 > maxBatchBytes || events.length >= maxEvents)) {
      finished.push({ events, byteLength });
      events = [];
      byteLength = 1;
    }

    events.push(event);
    byteLength += length + 1;
  }

  if (events.length > 0) {
    finished.push({ events, byteLength });
  }
  return finished;
}
