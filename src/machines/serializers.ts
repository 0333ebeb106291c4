import { COLON, LF, RS, SPACE, encoder } from "../constants";
import { concatBytes } from "../lib/bytes";
import type { ServerSentEvent } from "../types";
import { MappingMachine } from "./mapping";

const NEWLINES = /\r\n|\r|\n/;

/** `<payload><LF>` */
export class LineSerializer extends MappingMachine<Uint8Array, Uint8Array> {
  constructor() {
    super("LineSerializer", serializeLine);
  }
}

/** `<RS><payload><LF>` */
export class JSONSequenceSerializer extends MappingMachine<Uint8Array, Uint8Array> {
  constructor() {
    super("JSONSequenceSerializer", serializeRecord);
  }
}

/**
 * Writes `id`, `event` and `retry` (when present), one `data` line per line of the
 * payload, and a blank line closing the event.
 */
export class ServerSentEventSerializer extends MappingMachine<ServerSentEvent, Uint8Array> {
  constructor() {
    super("ServerSentEventSerializer", serializeEvent);
  }
}

function serializeLine(line: Uint8Array): Uint8Array {
  const out = new Uint8Array(line.length + 1);
  out.set(line);
  out[line.length] = LF;
  return out;
}

function serializeRecord(record: Uint8Array): Uint8Array {
  const out = new Uint8Array(record.length + 2);
  out[0] = RS;
  out.set(record, 1);
  out[record.length + 1] = LF;
  return out;
}

function serializeEvent(event: ServerSentEvent): Uint8Array {
  const fields: Uint8Array[] = [];
  if (event.id !== undefined) fields.push(encodeField("id", event.id));
  if (event.event !== undefined) fields.push(encodeField("event", event.event));
  if (event.retry !== undefined) fields.push(encodeField("retry", String(event.retry)));
  if (event.data !== undefined) {
    for (const line of event.data.split(NEWLINES)) {
      fields.push(encodeField("data", line));
    }
  }
  fields.push(Uint8Array.of(LF));
  return concatBytes(fields);
}

function encodeField(name: string, value: string): Uint8Array {
  const nameBytes = encoder.encode(name);
  const valueBytes = encoder.encode(value);
  const out = new Uint8Array(nameBytes.length + valueBytes.length + 3);
  out.set(nameBytes);
  out[nameBytes.length] = COLON;
  out[nameBytes.length + 1] = SPACE;
  out.set(valueBytes, nameBytes.length + 2);
  out[out.length - 1] = LF;
  return out;
}
