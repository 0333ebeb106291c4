/** An incremental source of raw bytes, e.g. a request or response body. */
export type ByteSource =
  | AsyncIterable<Uint8Array>
  | Iterable<Uint8Array>
  | ReadableStream<Uint8Array>;

/** A source of events or frames to serialize. */
export type EventSource<T> = AsyncIterable<T> | Iterable<T>;

/** A Server-Sent Event with a plain string payload. */
export interface ServerSentEvent {
  /** Identifier of the event, reported back as `Last-Event-ID` on reconnect. */
  id?: string;
  /** The event type, helps inform how to interpret the data. */
  event?: string;
  /** The payload; multiple `data:` lines are joined with "\n". */
  data?: string;
  /** Reconnection delay in milliseconds. */
  retry?: number;
}

/** A Server-Sent Event whose payload is a JSON value. */
export interface ServerSentEventWithJSONData<T> {
  id?: string;
  event?: string;
  data?: T;
  retry?: number;
}

/**
 * Decides whether the stream continues after an event with the given data.
 * Returning false drops that event and ends the stream.
 */
export type ContinuePredicate = (data: string) => boolean;

/** Turns values into bytes and back. Errors propagate to the caller unchanged. */
export interface JSONCodec {
  encode(value: unknown): Uint8Array;
  decode<T = unknown>(bytes: Uint8Array): T;
}

export interface JSONCodecOptions {
  /** Emit object keys in sorted order. Defaults to true. */
  sortKeys?: boolean;
  /** Passed to `JSON.parse` when decoding. */
  reviver?: (this: unknown, key: string, value: unknown) => unknown;
}

export interface DecodeOptions {
  /**
   * Maximum payload length of a single frame, in bytes, delimiter excluded.
   * Exceeding it ends the stream with a FrameTooLargeError. Defaults to Infinity.
   */
  maxFrameLength?: number;
  /** Aborts iteration and releases the byte source. */
  signal?: AbortSignal;
}

export interface JSONDecodeOptions extends DecodeOptions {
  /** Defaults to `createJSONCodec()`. */
  codec?: JSONCodec;
}

export interface ServerSentEventsDecodeOptions extends DecodeOptions {
  /** Called with the data of every completed event that carries data. */
  continueWhile?: ContinuePredicate;
}

export interface ServerSentEventsJSONDecodeOptions
  extends ServerSentEventsDecodeOptions {
  codec?: JSONCodec;
}

export interface JSONEncodeOptions {
  /** Defaults to `createJSONCodec()`. */
  codec?: JSONCodec;
}
