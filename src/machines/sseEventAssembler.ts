import { COLON, SPACE, decoder } from "../constants";
import { InvalidStateError } from "../errors";
import type { ContinuePredicate, ServerSentEvent } from "../types";
import {
  END,
  type IngestAction,
  NEEDS_MORE,
  NOOP,
  type PollAction,
  type StateMachine,
  emit,
} from "./types";

export type AssemblerState =
  | {
    readonly kind: "accumulatingEvent";
    event: ServerSentEvent;
    readonly lines: Uint8Array[];
  }
  | { readonly kind: "finished" };

const RETRY_PATTERN = /^[+-]?\d+$/;

const continueAlways: ContinuePredicate = () => true;

/**
 * Assembles lines produced by the SSE line framer into events.
 *
 * An event is dispatched on a blank line. Whatever is still accumulating when the
 * upstream ends is dropped, as the event stream format requires.
 */
export class ServerSentEventAssembler implements StateMachine<Uint8Array, ServerSentEvent> {
  private _state: AssemblerState = { kind: "accumulatingEvent", event: {}, lines: [] };

  constructor(private readonly continueWhile: ContinuePredicate = continueAlways) { }

  get state(): AssemblerState {
    return this._state;
  }

  poll(): PollAction<ServerSentEvent> {
    const state = this._state;
    if (state.kind === "finished") return END;

    const line = state.lines.shift();
    if (line === undefined) return NEEDS_MORE;

    if (line.length === 0) return this.dispatch(state.event, state.lines);
    if (line[0] === COLON) return NOOP; // comment

    const colonPos = line.indexOf(COLON);
    if (colonPos === -1) return NOOP;

    const field = decoder.decode(line.subarray(0, colonPos));
    let valueStart = colonPos + 1;
    if (line[valueStart] === SPACE) valueStart++;
    const value = decoder.decode(line.subarray(valueStart));

    const event = state.event;
    switch (field) {
      case "event":
        event.event = value;
        break;
      case "data":
        event.data = (event.data ?? "") + value + "\n";
        break;
      case "id":
        event.id = value;
        break;
      case "retry": {
        const retry = parseRetry(value);
        if (retry !== undefined) event.retry = retry;
        break;
      }
    }
    return NOOP;
  }

  ingest(line: Uint8Array | null): IngestAction<ServerSentEvent> {
    const state = this._state;
    if (state.kind === "finished") {
      throw new InvalidStateError("ServerSentEventAssembler", "ingest");
    }
    if (line === null) {
      this._state = { kind: "finished" };
      return END;
    }
    state.lines.push(line);
    return NOOP;
  }

  private dispatch(event: ServerSentEvent, lines: Uint8Array[]): PollAction<ServerSentEvent> {
    this._state = { kind: "accumulatingEvent", event: {}, lines };

    if (event.data !== undefined && event.data.endsWith("\n")) {
      event.data = event.data.slice(0, -1);
    }
    if (event.data !== undefined && !this.continueWhile(event.data)) {
      this._state = { kind: "finished" };
      return END;
    }
    return emit(event);
  }
}

function parseRetry(value: string): number | undefined {
  if (!RETRY_PATTERN.test(value)) return undefined;
  const retry = Number(value);
  return Number.isSafeInteger(retry) ? retry : undefined;
}
