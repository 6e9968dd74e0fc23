/**
 * Honeycomb event assembly.
 *
 * One finished span becomes one Honeycomb event. The event's `data` is the
 * span's cleaned attributes, merged with the resource's attributes and with
 * trace metadata derived from the span itself (ids, name, duration, kind).
 */

import { SpanKind, diag, type DiagLogger, type HrTime } from "@opentelemetry/api";
import { hrTimeToMicroseconds } from "@opentelemetry/core";
import type { ReadableSpan } from "@opentelemetry/sdk-trace-base";
import {
  MAX_VALUE_BYTES,
  cleanAttributes,
  mergeAttributes,
  sortAttributes,
  trimLongStrings,
  type AttributePair,
  type CleanAttributeValue,
  type CleanAttributes,
} from "./attributes.js";
import type { AttributeMap } from "./config.js";

/**
 * Span fields the exporter reads, decoupled from the SDK's span class.
 */
export interface SpanRecord {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name: string;
  kind: SpanKind;
  startTime: HrTime;
  endTime: HrTime;
  attributes: unknown;
}

export type EventData = Record<string, CleanAttributeValue>;

/**
 * Honeycomb event suitable for the batch API.
 *
 * `samplerate` is left unset until a sample rate attribute or a sampler
 * decides it; it goes on the wire as 1 in that case.
 */
export interface HoneycombEvent {
  time: string;
  data: EventData;
  samplerate?: number;
  traceId: string;
}

/**
 * The JSON shape POSTed to Honeycomb.
 */
export interface WireEvent {
  time: string;
  samplerate: number;
  data: EventData;
}

export interface AssembleOptions {
  attributeMap: AttributeMap;
  samplerateKey?: string | null;
  maxValueBytes?: number;
  logger?: DiagLogger;
}

/**
 * Adapt an SDK span to a {@link SpanRecord}.
 */
export function toSpanRecord(span: ReadableSpan): SpanRecord {
  const context = span.spanContext();
  return {
    traceId: context.traceId,
    spanId: context.spanId,
    parentSpanId: span.parentSpanId,
    name: span.name,
    kind: span.kind,
    startTime: span.startTime,
    endTime: span.endTime,
    attributes: span.attributes,
  };
}

/**
 * Format microseconds since the epoch as ISO 8601 UTC, e.g.
 * `"2019-05-17T09:55:12.622658Z"`.
 */
export function formatMicroseconds(us: number): string {
  const whole = Math.floor(us);
  const ms = Math.floor(whole / 1000);
  const micros = String(whole - ms * 1000).padStart(3, "0");
  return new Date(ms).toISOString().replace(/Z$/, `${micros}Z`);
}

/**
 * The current UTC time in the event timestamp format.
 */
export function now(): string {
  return formatMicroseconds(Date.now() * 1000);
}

function hexId(id: string | undefined, width: number): string | undefined {
  if (id === undefined || id === "" || /^0+$/.test(id)) {
    return undefined;
  }
  return id.toLowerCase().padStart(width, "0");
}

function spanKindName(kind: SpanKind): string {
  switch (kind) {
    case SpanKind.INTERNAL:
      return "internal";
    case SpanKind.SERVER:
      return "server";
    case SpanKind.CLIENT:
      return "client";
    case SpanKind.PRODUCER:
      return "producer";
    case SpanKind.CONSUMER:
      return "consumer";
    default:
      return "internal";
  }
}

function derivedAttributes(span: SpanRecord, attributeMap: AttributeMap): CleanAttributes {
  const derived: Array<[keyof AttributeMap, CleanAttributeValue | undefined]> = [
    ["durationMs", (hrTimeToMicroseconds(span.endTime) - hrTimeToMicroseconds(span.startTime)) / 1000],
    ["name", span.name],
    ["parentSpanId", hexId(span.parentSpanId, 16)],
    ["spanId", hexId(span.spanId, 16)],
    ["traceId", hexId(span.traceId, 32)],
    ["spanType", spanKindName(span.kind)],
  ];

  const pairs: AttributePair[] = [];
  for (const [field, value] of derived) {
    const target = attributeMap[field];
    if (typeof target === "string" && target !== "" && value !== undefined) {
      pairs.push([target, value]);
    }
  }
  return sortAttributes(pairs);
}

function popSampleRate(
  data: EventData,
  samplerateKey: string | null | undefined,
  logger: DiagLogger
): number | undefined {
  if (samplerateKey === null || samplerateKey === undefined || !Object.hasOwn(data, samplerateKey)) {
    return undefined;
  }

  const value = data[samplerateKey];
  delete data[samplerateKey];

  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value;
  }
  logger.warn(`sample rate attribute ${samplerateKey} is not a positive integer; ignoring it`);
  return undefined;
}

/**
 * Convert one span to Honeycomb events.
 *
 * Derived metadata wins over span attributes, which win over resource
 * attributes. Always returns exactly one event.
 */
export function assembleEvents(
  span: SpanRecord,
  resourceAttributes: CleanAttributes,
  options: AssembleOptions
): HoneycombEvent[] {
  const logger = options.logger ?? diag;

  const merged = mergeAttributes(
    derivedAttributes(span, options.attributeMap),
    mergeAttributes(cleanAttributes(span.attributes), resourceAttributes)
  );

  const data: EventData = Object.fromEntries(trimLongStrings(merged, options.maxValueBytes ?? MAX_VALUE_BYTES));
  const samplerate = popSampleRate(data, options.samplerateKey, logger);

  const event: HoneycombEvent = {
    time: formatMicroseconds(hrTimeToMicroseconds(span.startTime)),
    data,
    traceId: span.traceId,
  };
  if (samplerate !== undefined) {
    event.samplerate = samplerate;
  }
  return [event];
}

/**
 * Strip exporter-only fields and default the sample rate.
 */
export function toWireEvent(event: HoneycombEvent): WireEvent {
  return {
    time: event.time,
    samplerate: event.samplerate ?? 1,
    data: event.data,
  };
}

/**
 * Copy of `event` with a new sample rate.
 */
export function withSampleRate(event: HoneycombEvent, samplerate: number): HoneycombEvent {
  return { ...event, samplerate };
}
