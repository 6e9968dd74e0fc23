/**
 * Tests for the bundled HTTP clients.
 */

import { describe, it, expect } from "vitest";
import { ConsoleHttpClient, WriteKeyMissingHttpClient, isHttpClient, type HttpRequest } from "../http.js";

const request: HttpRequest = {
  method: "POST",
  url: "https://api.honeycomb.io/1/batch/checkout",
  headers: { "Content-Type": "application/json", "X-Honeycomb-Team": "test-key" },
  body: '[{"time":"2019-05-17T09:55:12.622658Z","samplerate":1,"data":{"name":"some-span"}}]',
};

describe("WriteKeyMissingHttpClient", () => {
  it("should answer 204 without sending", async () => {
    expect(await new WriteKeyMissingHttpClient().request(request)).toEqual({ status: 204, headers: {}, body: "" });
  });
});

describe("ConsoleHttpClient", () => {
  it("should print the request and answer 204", async () => {
    const output: string[] = [];
    const client = new ConsoleHttpClient((text) => output.push(text));

    const response = await client.request(request);

    expect(response.status).toBe(204);
    expect(output).toEqual([
      [
        "",
        "POST /1/batch/checkout HTTP/1.1",
        "Host: api.honeycomb.io",
        "Content-Type: application/json",
        "X-Honeycomb-Team: test-key",
        "",
        "[",
        "  {",
        '    "time": "2019-05-17T09:55:12.622658Z",',
        '    "samplerate": 1,',
        '    "data": {',
        '      "name": "some-span"',
        "    }",
        "  }",
        "]",
        "",
      ].join("\n"),
    ]);
  });

  it("should print a body that isn't JSON as is", async () => {
    const output: string[] = [];
    const client = new ConsoleHttpClient((text) => output.push(text));

    await client.request({ ...request, body: "not json" });

    expect(output[0].endsWith("\n\nnot json\n")).toBe(true);
  });
});

describe("isHttpClient", () => {
  it("should recognise objects with a request method", () => {
    expect(isHttpClient(new WriteKeyMissingHttpClient())).toBe(true);
    expect(isHttpClient({ request: "nope" })).toBe(false);
    expect(isHttpClient(null)).toBe(false);
  });
});
