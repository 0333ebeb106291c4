import { INITIAL_BUFFER_SIZE } from "../constants";

/**
 * A growable byte buffer that holds the bytes received since the last emitted frame.
 *
 * Consumed bytes are dropped by advancing a read offset. When an append does not fit,
 * the live bytes move into a freshly allocated array instead of being shifted with
 * `copyWithin`, so views handed out by {@link extract} are never overwritten.
 */
export class FrameBuffer {
  private buffer: Uint8Array;
  private readPos = 0;
  private writePos = 0;

  constructor(initialSize: number = INITIAL_BUFFER_SIZE) {
    if (initialSize <= 0) throw new RangeError("Buffer size must be positive.");
    this.buffer = new Uint8Array(initialSize);
  }

  /** Number of unconsumed bytes. */
  get length(): number {
    return this.writePos - this.readPos;
  }

  get capacity(): number {
    return this.buffer.length;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.ensureCapacity(chunk.length);
    this.buffer.set(chunk, this.writePos);
    this.writePos += chunk.length;
  }

  /** Returns the byte at `offset` from the start of the unconsumed bytes. */
  peekByte(offset: number): number | undefined {
    if (offset < 0 || offset >= this.length) return undefined;
    return this.buffer[this.readPos + offset];
  }

  /** Index of the first byte contained in `needles`, relative to the unconsumed bytes, or -1. */
  indexOfAny(needles: readonly number[]): number {
    if (needles.length === 1) {
      return this.buffer.subarray(this.readPos, this.writePos).indexOf(needles[0]);
    }
    for (let i = this.readPos; i < this.writePos; i++) {
      if (needles.includes(this.buffer[i])) return i - this.readPos;
    }
    return -1;
  }

  /**
   * Removes `payloadLength + delimiterLength` bytes from the front in one step and
   * returns a view of the payload part.
   */
  extract(payloadLength: number, delimiterLength: number = 0): Uint8Array {
    if (payloadLength < 0 || delimiterLength < 0 || payloadLength + delimiterLength > this.length) {
      throw new RangeError(
        `Cannot extract ${payloadLength + delimiterLength} bytes from a buffer holding ${this.length}.`,
      );
    }
    const start = this.readPos;
    const payload = this.buffer.subarray(start, start + payloadLength);
    this.consume(payloadLength + delimiterLength);
    return payload;
  }

  /** Drops up to `len` bytes from the front. */
  consume(len: number): void {
    if (len <= 0) return;
    // Positions only move forward within one array; outstanding views sit behind readPos.
    this.readPos = Math.min(this.readPos + len, this.writePos);
  }

  /** Removes and returns every unconsumed byte. */
  drain(): Uint8Array {
    return this.extract(this.length);
  }

  private ensureCapacity(additionalBytes: number): void {
    if (this.writePos + additionalBytes <= this.buffer.length) return;
    const live = this.length;
    const requiredSize = live + additionalBytes;
    const newSize = Math.max(requiredSize, live * 2, INITIAL_BUFFER_SIZE);
    const newBuffer = new Uint8Array(newSize);
    newBuffer.set(this.buffer.subarray(this.readPos, this.writePos));
    this.buffer = newBuffer;
    this.readPos = 0;
    this.writePos = live;
  }
}
