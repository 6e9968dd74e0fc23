/** Exporter version, sent in the User-Agent header. */
export const VERSION = "0.1.0";

export const USER_AGENT = `otel-honeycomb-exporter/${VERSION}`;
