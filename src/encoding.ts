import { defaultJSONCodec, encodeEventData } from "./codec";
import {
  JSONSequenceSerializer,
  LineSerializer,
  ServerSentEventSerializer,
} from "./machines/serializers";
import { drive, toAsyncEvents } from "./stream";
import type {
  EventSource,
  JSONCodec,
  JSONEncodeOptions,
  ServerSentEvent,
  ServerSentEventWithJSONData,
} from "./types";

type Encoded = AsyncGenerator<Uint8Array, void, undefined>;

async function* encodeEach<T>(source: EventSource<T>, codec: JSONCodec): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const value of toAsyncEvents(source)) {
    yield codec.encode(value);
  }
}

/** Writes each line followed by LF. */
export function serializeLines(lines: EventSource<Uint8Array>): Encoded {
  return drive(new LineSerializer(), toAsyncEvents(lines));
}

export function encodeJSONLines<T>(values: EventSource<T>, options: JSONEncodeOptions = {}): Encoded {
  return serializeLines(encodeEach(values, options.codec ?? defaultJSONCodec));
}

/** Writes each record as `<RS><record><LF>`. */
export function serializeJSONSequence(records: EventSource<Uint8Array>): Encoded {
  return drive(new JSONSequenceSerializer(), toAsyncEvents(records));
}

export function encodeJSONSequence<T>(values: EventSource<T>, options: JSONEncodeOptions = {}): Encoded {
  return serializeJSONSequence(encodeEach(values, options.codec ?? defaultJSONCodec));
}

/** Writes events in the `text/event-stream` format, one chunk per event. */
export function encodeServerSentEvents(events: EventSource<ServerSentEvent>): Encoded {
  return drive(new ServerSentEventSerializer(), toAsyncEvents(events));
}

async function* withEncodedData<T>(
  events: EventSource<ServerSentEventWithJSONData<T>>,
  codec: JSONCodec,
): AsyncGenerator<ServerSentEvent, void, undefined> {
  for await (const event of toAsyncEvents(events)) {
    yield encodeEventData(event, codec);
  }
}

/** Like {@link encodeServerSentEvents}, with each `data` value encoded as JSON first. */
export function encodeServerSentEventsWithJSONData<T>(
  events: EventSource<ServerSentEventWithJSONData<T>>,
  options: JSONEncodeOptions = {},
): Encoded {
  return encodeServerSentEvents(withEncodedData(events, options.codec ?? defaultJSONCodec));
}
