import { CR, LF } from "../constants";
import { FrameTooLargeError, InvalidStateError } from "../errors";
import { FrameBuffer } from "../lib/frameBuffer";
import {
  END,
  type IngestAction,
  NEEDS_MORE,
  NOOP,
  type PollAction,
  type StateMachine,
  emit,
} from "./types";

/** The knobs that distinguish one delimiter-based framing from another. */
export interface FramingPolicy {
  /** Used in error messages. */
  readonly name: string;
  /** Any of these bytes ends the current frame. */
  readonly delimiters: readonly number[];
  /** After a CR delimiter, swallow one LF if it is the very next byte. */
  readonly collapseCRLF: boolean;
  /** The first byte of the stream must be this one; it is consumed, not emitted. */
  readonly leadingByte?: number;
  /** Builds the error raised when `leadingByte` is missing. */
  readonly missingLeadingByte?: () => Error;
  /** Drop zero-length frames instead of emitting them. */
  readonly skipEmptyFrames: boolean;
  /** Emit a non-empty remainder that has no closing delimiter when the source ends. */
  readonly emitTrailing: boolean;
  /** Upper bound on the payload length of one frame. */
  readonly maxFrameLength: number;
}

export type FramerState =
  | { readonly kind: "initial" }
  | { readonly kind: "waitingForDelimiter" }
  | { readonly kind: "consumedCR" }
  | { readonly kind: "parsingRecord" }
  | { readonly kind: "finished" };

const INITIAL: FramerState = { kind: "initial" };
const WAITING: FramerState = { kind: "waitingForDelimiter" };
const CONSUMED_CR: FramerState = { kind: "consumedCR" };
const PARSING_RECORD: FramerState = { kind: "parsingRecord" };
const FINISHED: FramerState = { kind: "finished" };

/**
 * Splits an arbitrarily chunked byte stream into frames according to a
 * {@link FramingPolicy}. Each emitted frame is a view of the payload bytes without
 * its delimiter.
 */
export class DelimiterFramer implements StateMachine<Uint8Array, Uint8Array> {
  private readonly buffer = new FrameBuffer();
  private _state: FramerState;

  constructor(private readonly policy: FramingPolicy) {
    this._state = policy.leadingByte === undefined ? WAITING : INITIAL;
  }

  get state(): FramerState {
    return this._state;
  }

  /** Bytes received but not yet emitted. */
  get buffered(): number {
    return this.buffer.length;
  }

  poll(): PollAction<Uint8Array> {
    switch (this._state.kind) {
      case "initial":
        return this.checkLeadingByte();
      case "waitingForDelimiter":
      case "parsingRecord":
        return this.scan();
      case "consumedCR": {
        const next = this.buffer.peekByte(0);
        if (next === undefined) return NEEDS_MORE;
        if (next === LF) this.buffer.consume(1);
        this._state = WAITING;
        return NOOP;
      }
      case "finished":
        return END;
    }
  }

  ingest(chunk: Uint8Array | null): IngestAction<Uint8Array> {
    if (this._state.kind === "finished") {
      throw new InvalidStateError(this.policy.name, "ingest");
    }
    if (chunk !== null) {
      this.buffer.append(chunk);
      return NOOP;
    }
    this._state = FINISHED;
    const remainder = this.buffer.drain();
    if (remainder.length === 0 || !this.policy.emitTrailing) return END;
    return emit(remainder);
  }

  private checkLeadingByte(): PollAction<Uint8Array> {
    const first = this.buffer.peekByte(0);
    if (first === undefined) return NEEDS_MORE;
    if (first !== this.policy.leadingByte) {
      return this.fail(
        this.policy.missingLeadingByte?.() ??
          new Error(`${this.policy.name}: unexpected leading byte 0x${first.toString(16)}.`),
      );
    }
    this.buffer.consume(1);
    this._state = PARSING_RECORD;
    return NOOP;
  }

  private scan(): PollAction<Uint8Array> {
    const index = this.buffer.indexOfAny(this.policy.delimiters);
    // Measured on the payload so the outcome does not depend on chunking.
    const payloadLength = index === -1 ? this.buffer.length : index;
    if (payloadLength > this.policy.maxFrameLength) {
      return this.fail(new FrameTooLargeError(this.policy.maxFrameLength, payloadLength));
    }
    if (index === -1) return NEEDS_MORE;
    const delimiter = this.buffer.peekByte(index);
    const frame = this.buffer.extract(index, 1);
    if (this.policy.collapseCRLF && delimiter === CR) {
      this._state = CONSUMED_CR;
    }
    if (frame.length === 0 && this.policy.skipEmptyFrames) return NOOP;
    return emit(frame);
  }

  private fail(error: Error): PollAction<Uint8Array> {
    this._state = FINISHED;
    this.buffer.drain();
    return { type: "error", error };
  }
}
