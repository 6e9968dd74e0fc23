/**
 * Tests for samplers and deterministic sampling.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { HoneycombEvent } from "../event.js";
import {
  FixedSampler,
  SamplerRegistry,
  defaultSamplerRegistry,
  sampleEvents,
  shouldKeep,
  type SampleResult,
  type Sampler,
} from "../sampler.js";
import { TRACE_ID, createTestLogger } from "./helpers.js";

function event(overrides: Partial<HoneycombEvent> = {}): HoneycombEvent {
  return {
    time: "2019-05-17T09:55:12.622658Z",
    data: { name: "some-span" },
    traceId: "00000000000000000000000000000001",
    ...overrides,
  };
}

class ReturnsSampler implements Sampler {
  constructor(private readonly result: (event: HoneycombEvent) => SampleResult) {}

  sample(event: HoneycombEvent): SampleResult {
    return this.result(event);
  }
}

describe("FixedSampler", () => {
  it("should set the rate on undecided events", () => {
    expect(new FixedSampler({ rate: 8 }).sample(event())).toBe(8);
  });

  it("should leave decided events alone", () => {
    const decided = event({ samplerate: 3 });
    expect(new FixedSampler({ rate: 8 }).sample(decided)).toBe(decided);
  });

  it("should override decided events when all is set", () => {
    expect(new FixedSampler({ rate: 8, all: true }).sample(event({ samplerate: 3 }))).toBe(8);
  });

  it("should reject a rate that isn't a positive integer", () => {
    expect(() => new FixedSampler({ rate: 0 })).toThrow(RangeError);
    expect(() => new FixedSampler({ rate: 1.5 })).toThrow(RangeError);
  });
});

describe("sampleEvents", () => {
  it("should apply a returned rate", () => {
    const [sampled] = sampleEvents([event()], [new FixedSampler({ rate: 4 })]);
    expect(sampled.samplerate).toBe(4);
  });

  it("should feed each sampler the previous sampler's output", () => {
    const seen: Array<number | undefined> = [];
    const recorder = new ReturnsSampler((e) => {
      seen.push(e.samplerate);
      return undefined;
    });

    const [sampled] = sampleEvents([event()], [new FixedSampler({ rate: 4 }), new FixedSampler({ rate: 9 }), recorder]);

    expect(sampled.samplerate).toBe(4);
    expect(seen).toEqual([4]);
  });

  it("should use a returned event verbatim", () => {
    const replacement = event({ data: { name: "renamed" }, samplerate: 2 });
    const [sampled] = sampleEvents([event()], [new ReturnsSampler(() => replacement)]);
    expect(sampled).toBe(replacement);
  });

  it("should keep the event for null", () => {
    const original = event();
    const [sampled] = sampleEvents([original], [new ReturnsSampler(() => null)]);
    expect(sampled).toBe(original);
  });

  it("should warn and keep the event for an unexpected result", () => {
    const logger = createTestLogger();
    const original = event();

    const [sampled] = sampleEvents([original], [new ReturnsSampler(() => -3)], logger);

    expect(sampled).toBe(original);
    expect(logger.warn).toHaveBeenCalledWith("unexpected return value from sampler ReturnsSampler; keeping event");
  });

  it("should warn and keep the event when a sampler throws", () => {
    const logger = createTestLogger();
    const original = event();
    const throwing = new ReturnsSampler(() => {
      throw new Error("sampler bug");
    });

    const [sampled] = sampleEvents([original], [throwing, new FixedSampler({ rate: 4 })], logger);

    expect(sampled.samplerate).toBe(4);
    expect(sampled.data).toBe(original.data);
    expect(logger.warn).toHaveBeenCalledWith("sampler ReturnsSampler threw Error: sampler bug; keeping event");
  });

  it.each([2.5, 0, -1])("should keep the original for a returned event with sample rate %s", (samplerate) => {
    const logger = createTestLogger();
    const original = event();

    const [sampled] = sampleEvents([original], [new ReturnsSampler((e) => ({ ...e, samplerate }))], logger);

    expect(sampled).toBe(original);
    expect(logger.warn).toHaveBeenCalledWith("unexpected return value from sampler ReturnsSampler; keeping event");
  });

  it("should not modify the input list", () => {
    const events = [event()];
    sampleEvents(events, [new FixedSampler({ rate: 4 })]);
    expect(events[0].samplerate).toBeUndefined();
  });
});

describe("SamplerRegistry", () => {
  it("should build a fixed sampler from options", () => {
    const sampler = defaultSamplerRegistry.create({ type: "fixed", options: { rate: 5, all: true } });
    expect(sampler.sample(event({ samplerate: 2 }))).toBe(5);
  });

  it("should reject unknown types", () => {
    expect(() => new SamplerRegistry().create({ type: "dynamic" })).toThrow("unknown sampler type: dynamic");
  });

  it("should resolve registered factories", () => {
    const registry = new SamplerRegistry().register("always-ten", () => new ReturnsSampler(() => 10));
    expect(registry.has("always-ten")).toBe(true);
    expect(registry.create({ type: "always-ten" }).sample(event())).toBe(10);
  });
});

describe("shouldKeep", () => {
  it("should keep events with rate 1 or no rate", () => {
    expect(shouldKeep(event())).toBe(true);
    expect(shouldKeep(event({ samplerate: 1 }))).toBe(true);
  });

  it("should decide by trace id", () => {
    expect(shouldKeep(event({ traceId: "00000000000000000000000000000001", samplerate: 2 }))).toBe(true);
    expect(shouldKeep(event({ traceId: "00000000000000000000000000000002", samplerate: 2 }))).toBe(false);
    expect(shouldKeep(event({ traceId: TRACE_ID, samplerate: 10 }))).toBe(true);
    expect(shouldKeep(event({ traceId: TRACE_ID, samplerate: 100 }))).toBe(false);
  });

  it("should give the same answer for the same trace id and rate", () => {
    const traceIdArb = fc
      .uint8Array({ minLength: 16, maxLength: 16 })
      .map((bytes) => Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(""));

    fc.assert(
      fc.property(traceIdArb, fc.integer({ min: 1, max: 1000 }), (traceId, rate) => {
        const first = shouldKeep(event({ traceId, samplerate: rate }));
        const second = shouldKeep(event({ traceId, samplerate: rate, data: { other: true } }));
        expect(second).toBe(first);
      })
    );
  });

  it("should keep roughly one in n traces", () => {
    let kept = 0;
    for (let i = 0; i < 2000; i++) {
      if (shouldKeep(event({ traceId: i.toString(16).padStart(32, "0"), samplerate: 4 }))) kept++;
    }
    expect(kept).toBeGreaterThan(400);
    expect(kept).toBeLessThan(600);
  });
});
