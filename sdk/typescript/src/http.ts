/**
 * HTTP back ends.
 *
 * The exporter talks to Honeycomb through {@link HttpClient} so the transport
 * can be replaced. Three clients ship with it:
 *
 * - {@link FetchHttpClient}, the default, on the global `fetch`
 * - {@link WriteKeyMissingHttpClient}, installed when no write key is set
 * - {@link ConsoleHttpClient}, which prints what would be sent
 */

export interface HttpRequest {
  method: "POST";
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport capability. Rejects on transport-level failure; any HTTP status
 * resolves.
 */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

export function isHttpClient(value: unknown): value is HttpClient {
  return (
    typeof value === "object" &&
    value !== null &&
    "request" in value &&
    typeof value.request === "function"
  );
}

/**
 * Sends requests with `fetch`, aborting after `timeoutMs`.
 */
export class FetchHttpClient implements HttpClient {
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      headers,
      body: await response.text(),
    };
  }
}

/**
 * No-op client: every request succeeds with 204 and nothing leaves the
 * process.
 */
export class WriteKeyMissingHttpClient implements HttpClient {
  async request(_request: HttpRequest): Promise<HttpResponse> {
    return { status: 204, headers: {}, body: "" };
  }
}

/**
 * Prints each request instead of sending it, then answers 204.
 */
export class ConsoleHttpClient implements HttpClient {
  private readonly write: (text: string) => void;

  constructor(write: (text: string) => void = (text) => process.stdout.write(text)) {
    this.write = write;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    const lines = [
      `${request.method} ${url.pathname} HTTP/1.1`,
      `Host: ${url.host}`,
      ...Object.entries(request.headers).map(([key, value]) => `${key}: ${value}`),
      "",
      pretty(request.body),
    ];
    this.write(`\n${lines.join("\n")}\n`);
    return { status: 204, headers: {}, body: "" };
  }
}

function pretty(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return body;
  }
}
