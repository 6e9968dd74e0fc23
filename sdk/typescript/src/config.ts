/**
 * Exporter configuration.
 *
 * Options are checked once, when the exporter is created; an invalid option
 * throws a {@link ConfigurationError} naming it. Everything downstream gets
 * the resolved {@link ExporterConfig}.
 */

import { diag, type DiagLogger } from "@opentelemetry/api";
import { z } from "zod";
import { MAX_VALUE_BYTES } from "./attributes.js";
import { MAX_BATCH_BYTES, MAX_EVENT_BYTES } from "./chunker.js";
import { defaultDecoratorRegistry, type Decorator, type DecoratorSpec } from "./decorator.js";
import type { SendListener } from "./delivery.js";
import { FetchHttpClient, isHttpClient, type HttpClient } from "./http.js";
import type { JsonCodec } from "./json.js";
import { defaultSamplerRegistry, type Sampler, type SamplerSpec } from "./sampler.js";

/**
 * Dataset attributes used for span properties you didn't set as attributes.
 * Match these to the trace definitions configured for your dataset. A `null`
 * or empty name leaves the property out.
 */
export interface AttributeMap {
  durationMs: string | null;
  name: string | null;
  parentSpanId: string | null;
  spanId: string | null;
  spanType: string | null;
  traceId: string | null;
}

export const DEFAULT_ATTRIBUTE_MAP: Readonly<AttributeMap> = {
  durationMs: "duration_ms",
  name: "name",
  parentSpanId: "trace.parent_id",
  spanId: "trace.span_id",
  spanType: "meta.span_type",
  traceId: "trace.trace_id",
};

const ATTRIBUTE_MAP_FIELDS = [
  "durationMs",
  "name",
  "parentSpanId",
  "spanId",
  "spanType",
  "traceId",
] as const satisfies ReadonlyArray<keyof AttributeMap>;

export const DEFAULT_API_ENDPOINT = "https://api.honeycomb.io";
export const DEFAULT_DATASET = "opentelemetry";

/**
 * Options accepted by the exporter.
 */
export interface HoneycombExporterOptions {
  /**
   * Honeycomb API endpoint.
   * @default "https://api.honeycomb.io"
   */
  apiEndpoint?: string;

  /**
   * Dataset to send events to.
   * @default "opentelemetry"
   */
  dataset?: string;

  /**
   * Honeycomb write key. Without one, nothing is sent.
   */
  writeKey?: string | null;

  /** Overrides for {@link DEFAULT_ATTRIBUTE_MAP}. */
  attributeMap?: Partial<AttributeMap>;

  /**
   * Span attribute holding the event's sample rate. The attribute is removed
   * from the event data.
   */
  samplerateKey?: string | null;

  /** @default 102_400 */
  maxEventBytes?: number;

  /** @default 5_242_880 */
  maxBatchBytes?: number;

  /** @default 49_127 */
  maxValueBytes?: number;

  /** Also cap batches at this many events. */
  batchSize?: number;

  /** HTTP client; defaults to a {@link FetchHttpClient}. */
  httpClient?: HttpClient;

  /**
   * Request timeout for the default HTTP client.
   * @default 30_000
   */
  timeoutMs?: number;

  /** JSON codec; the exporter is disabled if this isn't a usable codec. */
  json?: unknown;

  /** Samplers, applied in order. */
  samplers?: Array<Sampler | SamplerSpec>;

  decorator?: Decorator | DecoratorSpec;

  /**
   * Drop events according to their sample rate, consistently per trace.
   * @default false
   */
  deterministicSampling?: boolean;

  /** Called around every batch send with the event count and elapsed time. */
  onSend?: SendListener;

  /** Logger for warnings; defaults to the OpenTelemetry `diag` logger. */
  logger?: DiagLogger;
}

/**
 * Fully-resolved configuration.
 */
export interface ExporterConfig {
  apiEndpoint: string;
  dataset: string;
  writeKey: string | null;
  attributeMap: AttributeMap;
  samplerateKey: string | null;
  maxEventBytes: number;
  maxBatchBytes: number;
  maxValueBytes: number;
  batchSize?: number;
  httpClient: HttpClient;
  json: JsonCodec;
  samplers: Sampler[];
  decorator?: Decorator;
  deterministicSampling: boolean;
  onSend?: SendListener;
  logger: DiagLogger;
}

/**
 * Thrown for an invalid option.
 */
export class ConfigurationError extends Error {
  constructor(
    readonly key: string,
    message: string
  ) {
    super(`invalid exporter option ${key}: ${message}`);
    this.name = "ConfigurationError";
  }
}

const isObject = (value: unknown): value is object => typeof value === "object" && value !== null;

const samplerSchema = z.union([
  z.object({ type: z.string().min(1), options: z.record(z.unknown()).optional() }).strict(),
  z.custom<Sampler>((value) => isObject(value) && "sample" in value && typeof value.sample === "function", {
    message: "expected a sampler or a { type, options } spec",
  }),
]);

const decoratorSchema = z.union([
  z.object({ type: z.string().min(1), options: z.record(z.unknown()).optional() }).strict(),
  z.custom<Decorator>((value) => isObject(value) && "decorate" in value && typeof value.decorate === "function", {
    message: "expected a decorator or a { type, options } spec",
  }),
]);

const positiveInt = z.number().int().positive();
const mappedName = z.string().nullable().optional();

const optionsSchema = z
  .object({
    apiEndpoint: z.string().url().optional(),
    dataset: z.string().min(1).optional(),
    writeKey: z.string().nullable().optional(),
    attributeMap: z
      .object({
        durationMs: mappedName,
        name: mappedName,
        parentSpanId: mappedName,
        spanId: mappedName,
        spanType: mappedName,
        traceId: mappedName,
      })
      .strict()
      .optional(),
    samplerateKey: z.string().min(1).nullable().optional(),
    maxEventBytes: positiveInt.optional(),
    maxBatchBytes: positiveInt.optional(),
    maxValueBytes: positiveInt.min(8).optional(),
    batchSize: positiveInt.optional(),
    httpClient: z.custom<HttpClient>(isHttpClient, { message: "expected an object with a request() method" }).optional(),
    timeoutMs: positiveInt.optional(),
    json: z.unknown().optional(),
    samplers: z.array(samplerSchema).optional(),
    decorator: decoratorSchema.optional(),
    deterministicSampling: z.boolean().optional(),
    onSend: z
      .custom<SendListener>((value) => typeof value === "function", { message: "expected a function" })
      .optional(),
    logger: z
      .custom<DiagLogger>((value) => isObject(value) && "warn" in value && typeof value.warn === "function", {
        message: "expected a DiagLogger",
      })
      .optional(),
  })
  .strict();

function firstIssue(error: z.ZodError): ConfigurationError {
  const issue = error.issues[0];
  if (issue.code === "unrecognized_keys") {
    const prefix = issue.path.length > 0 ? `${issue.path.join(".")}.` : "";
    return new ConfigurationError(`${prefix}${issue.keys[0]}`, "unknown option");
  }
  return new ConfigurationError(issue.path.join(".") || "options", issue.message);
}

function resolveSampler(entry: Sampler | SamplerSpec, index: number): Sampler {
  if ("sample" in entry) {
    return entry;
  }
  if (!defaultSamplerRegistry.has(entry.type)) {
    throw new ConfigurationError(`samplers.${index}.type`, `unknown sampler type ${entry.type}`);
  }
  try {
    return defaultSamplerRegistry.create(entry);
  } catch (err) {
    throw new ConfigurationError(`samplers.${index}.options`, err instanceof Error ? err.message : String(err));
  }
}

function resolveDecorator(entry: Decorator | DecoratorSpec): Decorator {
  if ("decorate" in entry) {
    return entry;
  }
  if (!defaultDecoratorRegistry.has(entry.type)) {
    throw new ConfigurationError("decorator.type", `unknown decorator type ${entry.type}`);
  }
  return defaultDecoratorRegistry.create(entry);
}

/**
 * Validate options and fill in defaults.
 *
 * `json` is passed through as given; {@link initExporter} decides what an
 * unusable codec means.
 */
export function resolveConfig(
  options: HoneycombExporterOptions,
  json: JsonCodec
): ExporterConfig {
  const parsed = optionsSchema.safeParse(options);
  if (!parsed.success) {
    throw firstIssue(parsed.error);
  }
  const opts = parsed.data;

  const maxEventBytes = opts.maxEventBytes ?? MAX_EVENT_BYTES;
  const maxBatchBytes = opts.maxBatchBytes ?? MAX_BATCH_BYTES;
  if (maxEventBytes + 2 > maxBatchBytes) {
    throw new ConfigurationError("maxBatchBytes", `must leave room for one event of maxEventBytes (${maxEventBytes})`);
  }

  const overrides = opts.attributeMap ?? {};
  const attributeMap: AttributeMap = { ...DEFAULT_ATTRIBUTE_MAP };
  for (const field of ATTRIBUTE_MAP_FIELDS) {
    const name = overrides[field];
    if (name !== undefined) {
      attributeMap[field] = name;
    }
  }

  return {
    apiEndpoint: (opts.apiEndpoint ?? DEFAULT_API_ENDPOINT).replace(/\/$/, ""),
    dataset: opts.dataset ?? DEFAULT_DATASET,
    writeKey: opts.writeKey ?? null,
    attributeMap,
    samplerateKey: opts.samplerateKey ?? null,
    maxEventBytes,
    maxBatchBytes,
    maxValueBytes: opts.maxValueBytes ?? MAX_VALUE_BYTES,
    batchSize: opts.batchSize,
    httpClient: opts.httpClient ?? new FetchHttpClient({ timeoutMs: opts.timeoutMs }),
    json,
    samplers: (opts.samplers ?? []).map(resolveSampler),
    decorator: opts.decorator ? resolveDecorator(opts.decorator) : undefined,
    deterministicSampling: opts.deterministicSampling ?? false,
    onSend: opts.onSend,
    logger: opts.logger ?? diag,
  };
}

/**
 * Read options from `HONEYCOMB_*` environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): HoneycombExporterOptions {
  const options: HoneycombExporterOptions = {};
  if (env.HONEYCOMB_WRITEKEY) options.writeKey = env.HONEYCOMB_WRITEKEY;
  if (env.HONEYCOMB_DATASET) options.dataset = env.HONEYCOMB_DATASET;
  if (env.HONEYCOMB_API_ENDPOINT) options.apiEndpoint = env.HONEYCOMB_API_ENDPOINT;
  if (env.HONEYCOMB_SAMPLERATE_KEY) options.samplerateKey = env.HONEYCOMB_SAMPLERATE_KEY;
  return options;
}
