import { decodeEventData, defaultJSONCodec } from "./codec";
import {
  createJSONSequenceFramer,
  createLineFramer,
  createServerSentEventLineFramer,
} from "./machines/framers";
import { ServerSentEventAssembler } from "./machines/sseEventAssembler";
import { drive, toAsyncIterable } from "./stream";
import type {
  ByteSource,
  DecodeOptions,
  JSONDecodeOptions,
  ServerSentEvent,
  ServerSentEventWithJSONData,
  ServerSentEventsDecodeOptions,
  ServerSentEventsJSONDecodeOptions,
} from "./types";

type Decoded<T> = AsyncGenerator<T, void, undefined>;

/** Splits a byte stream on LF. */
export function parseLines(source: ByteSource, options: DecodeOptions = {}): Decoded<Uint8Array> {
  return drive(
    createLineFramer(options),
    toAsyncIterable(source, options.signal),
    options.signal,
  );
}

/** Splits a byte stream on LF, CR or CRLF. */
export function parseServerSentEventLines(
  source: ByteSource,
  options: DecodeOptions = {},
): Decoded<Uint8Array> {
  return drive(
    createServerSentEventLineFramer(options),
    toAsyncIterable(source, options.signal),
    options.signal,
  );
}

/**
 * Splits a JSON Text Sequence into its records. Each record keeps the bytes that
 * follow its RS, trailing LF included.
 *
 * @throws MissingInitialRecordSeparatorError if the first byte is not RS.
 */
export function parseJSONSequence(
  source: ByteSource,
  options: DecodeOptions = {},
): Decoded<Uint8Array> {
  return drive(
    createJSONSequenceFramer(options),
    toAsyncIterable(source, options.signal),
    options.signal,
  );
}

export async function* decodeJSONLines<T = unknown>(
  source: ByteSource,
  options: JSONDecodeOptions = {},
): Decoded<T> {
  const codec = options.codec ?? defaultJSONCodec;
  for await (const line of parseLines(source, options)) {
    yield codec.decode<T>(line);
  }
}

export async function* decodeJSONSequence<T = unknown>(
  source: ByteSource,
  options: JSONDecodeOptions = {},
): Decoded<T> {
  const codec = options.codec ?? defaultJSONCodec;
  for await (const record of parseJSONSequence(source, options)) {
    yield codec.decode<T>(record);
  }
}

/**
 * Decodes a `text/event-stream` body into events.
 *
 * An event that the stream ends in the middle of is dropped. When `continueWhile`
 * returns false for an event's data, that event is dropped and iteration ends.
 */
export function decodeServerSentEvents(
  source: ByteSource,
  options: ServerSentEventsDecodeOptions = {},
): Decoded<ServerSentEvent> {
  return drive(
    new ServerSentEventAssembler(options.continueWhile),
    parseServerSentEventLines(source, options),
    options.signal,
  );
}

/** Like {@link decodeServerSentEvents}, with each `data` payload decoded as JSON. */
export async function* decodeServerSentEventsWithJSONData<T = unknown>(
  source: ByteSource,
  options: ServerSentEventsJSONDecodeOptions = {},
): Decoded<ServerSentEventWithJSONData<T>> {
  const codec = options.codec ?? defaultJSONCodec;
  for await (const event of decodeServerSentEvents(source, options)) {
    yield decodeEventData<T>(event, codec);
  }
}
