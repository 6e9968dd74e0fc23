/**
 * JSON back end.
 *
 * The exporter encodes events and decodes Honeycomb's replies through this
 * interface so callers can swap in another encoder.
 */

export interface JsonCodec {
  encode(value: unknown): string;
  decode(text: string): unknown;
}

export const defaultJsonCodec: JsonCodec = {
  encode: (value) => JSON.stringify(value),
  decode: (text): unknown => JSON.parse(text),
};

export function isJsonCodec(value: unknown): value is JsonCodec {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "encode" in value &&
    typeof value.encode === "function" &&
    "decode" in value &&
    typeof value.decode === "function"
  );
}
