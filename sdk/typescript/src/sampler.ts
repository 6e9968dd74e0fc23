/**
 * Sampling for Honeycomb events.
 *
 * Honeycomb differs from most trace backends in that it needs the sample rate
 * of every surviving event, so samplers here decide a rate per event rather
 * than a keep/drop bit per trace. Dropping happens afterwards, deterministically
 * per trace id, in {@link shouldKeep}.
 */

import { createHash } from "node:crypto";
import { diag, type DiagLogger } from "@opentelemetry/api";
import { withSampleRate, type HoneycombEvent } from "./event.js";

/**
 * What a sampler may return:
 *
 * - `undefined`, `null` or the event itself to keep it unmodified
 * - a positive integer to use as the new sample rate
 * - a modified copy of the event
 */
export type SampleResult = HoneycombEvent | number | null | undefined;

/**
 * Samplers packaged for reuse should not change an event whose sample rate is
 * already set unless that's their documented purpose.
 */
export interface Sampler {
  sample(event: HoneycombEvent): SampleResult;
}

export type SamplerFactory = (options: Record<string, unknown>) => Sampler;

/**
 * A sampler named by registry type, with options for its factory.
 */
export interface SamplerSpec {
  type: string;
  options?: Record<string, unknown>;
}

export interface FixedSamplerOptions {
  /** Sample rate to apply; a positive integer. */
  rate: number;
  /**
   * Whether to override rates already set.
   * @default false
   */
  all?: boolean;
}

/**
 * Fixed-rate sampling: sets `rate` on events that have no sample rate yet, or
 * on every event when `all` is set.
 */
export class FixedSampler implements Sampler {
  private readonly rate: number;
  private readonly all: boolean;

  constructor(options: FixedSamplerOptions) {
    if (!Number.isInteger(options.rate) || options.rate < 1) {
      throw new RangeError(`rate must be a positive integer; got ${options.rate}`);
    }
    this.rate = options.rate;
    this.all = options.all ?? false;
  }

  sample(event: HoneycombEvent): SampleResult {
    if (event.samplerate === undefined || this.all) {
      return this.rate;
    }
    return event;
  }
}

/**
 * Resolves {@link SamplerSpec}s to sampler instances.
 */
export class SamplerRegistry {
  private readonly factories = new Map<string, SamplerFactory>();

  register(type: string, factory: SamplerFactory): this {
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  create(spec: SamplerSpec): Sampler {
    const factory = this.factories.get(spec.type);
    if (!factory) {
      throw new Error(`unknown sampler type: ${spec.type}`);
    }
    return factory(spec.options ?? {});
  }
}

export const defaultSamplerRegistry = new SamplerRegistry().register("fixed", (options) => {
  const { rate, all } = options;
  if (typeof rate !== "number") {
    throw new RangeError("fixed sampler needs a numeric rate");
  }
  return new FixedSampler({ rate, all: all === true });
});

function isSampleRate(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isEvent(value: unknown): value is HoneycombEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "time" in value &&
    typeof value.time === "string" &&
    "data" in value &&
    typeof value.data === "object" &&
    value.data !== null &&
    "traceId" in value &&
    typeof value.traceId === "string" &&
    (!("samplerate" in value) || value.samplerate === undefined || isSampleRate(value.samplerate))
  );
}

function applySampler(sampler: Sampler, event: HoneycombEvent, logger: DiagLogger): HoneycombEvent {
  let result: unknown;
  try {
    result = sampler.sample(event);
  } catch (err) {
    logger.warn(`sampler ${sampler.constructor.name} threw ${String(err)}; keeping event`);
    return event;
  }

  if (result === undefined || result === null) {
    return event;
  }
  if (isSampleRate(result)) {
    return withSampleRate(event, result);
  }
  if (isEvent(result)) {
    return result;
  }

  logger.warn(`unexpected return value from sampler ${sampler.constructor.name}; keeping event`);
  return event;
}

/**
 * Run events through samplers in order, each seeing the previous sampler's
 * output.
 */
export function sampleEvents(
  events: readonly HoneycombEvent[],
  samplers: readonly Sampler[],
  logger: DiagLogger = diag
): HoneycombEvent[] {
  return samplers.reduce<HoneycombEvent[]>(
    (current, sampler) => current.map((event) => applySampler(sampler, event, logger)),
    [...events]
  );
}

const MODULUS = (1n << 64n) - 1n;

/**
 * Hash a trace id to an unsigned 64-bit integer.
 */
export function traceIdHash(traceId: string): bigint {
  return createHash("sha1").update(traceId).digest().readBigUInt64BE(0);
}

/**
 * Keep/drop decision for an event given its sample rate. The same trace id and
 * rate always produce the same decision.
 */
export function shouldKeep(event: HoneycombEvent): boolean {
  const rate = event.samplerate ?? 1;
  if (rate <= 1) {
    return true;
  }
  return traceIdHash(event.traceId) % MODULUS < MODULUS / BigInt(rate);
}
