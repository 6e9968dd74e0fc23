/**
 * Property-based tests for batch packing.
 */

import { Buffer } from "node:buffer";
import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { batchBody, chunkEvents } from "../chunker.js";
import { createTestLogger } from "./helpers.js";

const encodedArb = fc.array(fc.string({ minLength: 1, maxLength: 40 }).map((s) => JSON.stringify(s)), {
  maxLength: 60,
});

const limitsArb = fc.record({
  maxEventBytes: fc.integer({ min: 8, max: 64 }),
  extra: fc.integer({ min: 2, max: 400 }),
  maxEvents: fc.option(fc.integer({ min: 1, max: 10 }), { nil: undefined }),
});

describe("chunkEvents properties", () => {
  it("batches stay within the limits", () => {
    fc.assert(
      fc.property(encodedArb, limitsArb, (encoded, { maxEventBytes, extra, maxEvents }) => {
        const maxBatchBytes = maxEventBytes + extra;
        const batches = chunkEvents(encoded, { maxEventBytes, maxBatchBytes, maxEvents }, createTestLogger());

        for (const batch of batches) {
          expect(batch.events.length).toBeGreaterThan(0);
          expect(Buffer.byteLength(batchBody(batch))).toBe(batch.byteLength);
          expect(batch.byteLength).toBeLessThanOrEqual(maxBatchBytes);
          if (maxEvents !== undefined) {
            expect(batch.events.length).toBeLessThanOrEqual(maxEvents);
          }
        }
      })
    );
  });

  it("every event that fits is sent once, in order", () => {
    fc.assert(
      fc.property(encodedArb, limitsArb, (encoded, { maxEventBytes, extra, maxEvents }) => {
        const batches = chunkEvents(
          encoded,
          { maxEventBytes, maxBatchBytes: maxEventBytes + extra, maxEvents },
          createTestLogger()
        );

        const expected = encoded.filter((event) => Buffer.byteLength(event) <= maxEventBytes);
        expect(batches.flatMap((batch) => batch.events)).toEqual(expected);
      })
    );
  });
});
