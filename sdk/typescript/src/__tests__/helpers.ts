/**
 * Shared fakes for the exporter tests.
 */

import { SpanKind, type DiagLogger } from "@opentelemetry/api";
import { vi } from "vitest";
import type { SpanRecord } from "../event.js";
import type { HttpClient, HttpRequest, HttpResponse } from "../http.js";

export function createTestLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    verbose: vi.fn(),
  } satisfies DiagLogger;
}

export function reply(status: number, body = ""): HttpResponse {
  return { status, headers: {}, body };
}

/**
 * In-process HTTP client that records requests and answers with `respond`.
 */
export class RecordingHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly respond: (request: HttpRequest) => HttpResponse = () => reply(204)) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export const TRACE_ID = "0af7651916cd43dd8448eb211c80319c";
export const SPAN_ID = "b7ad6b7169203331";

// 2019-05-17T09:55:12.622658Z, lasting 2.5ms
export function makeSpan(overrides: Partial<SpanRecord> = {}): SpanRecord {
  return {
    traceId: TRACE_ID,
    spanId: SPAN_ID,
    name: "some-span",
    kind: SpanKind.INTERNAL,
    startTime: [1_558_086_912, 622_658_000],
    endTime: [1_558_086_912, 625_158_000],
    attributes: {},
    ...overrides,
  };
}
