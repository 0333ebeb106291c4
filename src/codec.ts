import { decoder, encoder } from "./constants";
import type {
  JSONCodec,
  JSONCodecOptions,
  ServerSentEvent,
  ServerSentEventWithJSONData,
} from "./types";

// Drops a leading byte order mark, which JSON.parse would reject.
const jsonDecoder = new TextDecoder();

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Rebuilds plain objects with their keys in sorted order; JSON.stringify keeps insertion order.
function sortKeysReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  // fromEntries defines own properties, so a "__proto__" key stays a plain key.
  return Object.fromEntries(Object.keys(value).sort().map((key) => [key, value[key]]));
}

/**
 * Creates the JSON codec used by the JSON Lines, JSON Sequence and SSE helpers.
 *
 * Output never contains a raw newline, which keeps every encoded value on one line.
 * Forward slashes are never escaped.
 */
export function createJSONCodec(options: JSONCodecOptions = {}): JSONCodec {
  const sortKeys = options.sortKeys ?? true;
  const reviver = options.reviver;

  return {
    encode(value: unknown): Uint8Array {
      const text = JSON.stringify(value, sortKeys ? sortKeysReplacer : undefined);
      // JSON.stringify returns undefined for undefined, functions and symbols.
      if (text === undefined) {
        throw new TypeError(`Value of type ${typeof value} has no JSON representation.`);
      }
      return encoder.encode(text);
    },
    decode<T = unknown>(bytes: Uint8Array): T {
      return JSON.parse(jsonDecoder.decode(bytes), reviver);
    },
  };
}

export const defaultJSONCodec: JSONCodec = createJSONCodec();

/** Decodes the `data` field of an event as JSON, keeping the other fields. */
export function decodeEventData<T>(
  event: ServerSentEvent,
  codec: JSONCodec,
): ServerSentEventWithJSONData<T> {
  const decoded: ServerSentEventWithJSONData<T> = {};
  if (event.id !== undefined) decoded.id = event.id;
  if (event.event !== undefined) decoded.event = event.event;
  if (event.data !== undefined) decoded.data = codec.decode<T>(encoder.encode(event.data));
  if (event.retry !== undefined) decoded.retry = event.retry;
  return decoded;
}

/** Encodes the `data` field of an event as JSON text, keeping the other fields. */
export function encodeEventData<T>(
  event: ServerSentEventWithJSONData<T>,
  codec: JSONCodec,
): ServerSentEvent {
  const encoded: ServerSentEvent = {};
  if (event.id !== undefined) encoded.id = event.id;
  if (event.event !== undefined) encoded.event = event.event;
  if (event.data !== undefined) encoded.data = decoder.decode(codec.encode(event.data));
  if (event.retry !== undefined) encoded.retry = event.retry;
  return encoded;
}
