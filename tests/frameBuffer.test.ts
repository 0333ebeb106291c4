import { CR, LF } from '../mod';
import { FrameBuffer } from '../src/lib/frameBuffer';
import { bytes, text } from './helpers';

describe('FrameBuffer', () => {
  it('rejects a non-positive initial size', () => {
    expect(() => new FrameBuffer(0)).toThrow(RangeError);
  });

  it('ignores zero-length appends', () => {
    const buffer = new FrameBuffer(4);
    buffer.append(new Uint8Array(0));
    expect(buffer.length).toBe(0);
    expect(buffer.peekByte(0)).toBeUndefined();
  });

  it('peeks relative to the unconsumed bytes', () => {
    const buffer = new FrameBuffer(8);
    buffer.append(bytes('xab'));
    buffer.consume(1);
    expect(buffer.peekByte(0)).toBe(0x61);
    expect(buffer.peekByte(1)).toBe(0x62);
    expect(buffer.peekByte(2)).toBeUndefined();
    expect(buffer.peekByte(-1)).toBeUndefined();
  });

  it('finds the first of several delimiters', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('ab\rc\n'));
    expect(buffer.indexOfAny([LF])).toBe(4);
    expect(buffer.indexOfAny([LF, CR])).toBe(2);
    buffer.consume(3);
    expect(buffer.indexOfAny([LF])).toBe(1);
    expect(buffer.indexOfAny([0x7a])).toBe(-1);
  });

  it('does not find delimiters that were already consumed', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('\nab'));
    buffer.consume(1);
    expect(buffer.indexOfAny([LF])).toBe(-1);
    expect(buffer.indexOfAny([LF, CR])).toBe(-1);
  });

  it('searches only the unconsumed bytes for a single delimiter', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('ab'));
    expect(buffer.indexOfAny([0x00])).toBe(-1);
    buffer.append(Uint8Array.of(0x00));
    expect(buffer.indexOfAny([0x00])).toBe(2);
  });

  it('extracts the payload and drops the delimiter in one step', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('hello\nworld'));
    const frame = buffer.extract(5, 1);
    expect(text(frame)).toBe('hello');
    expect(buffer.length).toBe(5);
    expect(text(buffer.drain())).toBe('world');
    expect(buffer.length).toBe(0);
  });

  it('refuses to extract more than it holds', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('ab'));
    expect(() => buffer.extract(2, 1)).toThrow(RangeError);
    expect(buffer.length).toBe(2);
  });

  it('clamps consume to the unconsumed length', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('ab'));
    buffer.consume(5);
    expect(buffer.length).toBe(0);
  });

  it('keeps handed-out frames intact when more bytes arrive', () => {
    const buffer = new FrameBuffer(16);
    buffer.append(bytes('ab\n'));
    const frame = buffer.extract(2, 1);
    buffer.append(bytes('xy\n'));
    expect(text(frame)).toBe('ab');
  });

  it('keeps handed-out frames intact when it grows', () => {
    const buffer = new FrameBuffer(4);
    buffer.append(bytes('abc'));
    const frame = buffer.extract(1);
    buffer.append(bytes('de'));
    expect(buffer.capacity).toBe(8192);
    expect(text(frame)).toBe('a');
    expect(text(buffer.drain())).toBe('bcde');
  });

  it('grows to fit a chunk larger than twice its contents', () => {
    const buffer = new FrameBuffer(4);
    buffer.append(new Uint8Array(10_000));
    expect(buffer.length).toBe(10_000);
    expect(buffer.capacity).toBe(10_000);
  });
});
