import { collect, concatBytes } from '../mod';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export const bytes = (value: string): Uint8Array => textEncoder.encode(value);

export const text = (value: Uint8Array): string => textDecoder.decode(value);

/** Splits `data` into chunks of at most `size` bytes. */
export function chunked(data: Uint8Array, size: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let i = 0; i < data.length; i += size) {
    chunks.push(data.slice(i, i + size));
  }
  return chunks;
}

export const bytewise = (value: string): Uint8Array[] => chunked(bytes(value), 1);

/** Yields each chunk after a microtask, like a network body would. */
export async function* asyncChunks(chunks: Uint8Array[]): AsyncGenerator<Uint8Array, void, undefined> {
  for (const chunk of chunks) {
    await Promise.resolve();
    yield chunk;
  }
}

export function readableFrom<T>(items: T[]): ReadableStream<T> {
  return new ReadableStream<T>({
    start(controller) {
      for (const item of items) controller.enqueue(item);
      controller.close();
    },
  });
}

export async function readAll<T>(stream: ReadableStream<T>): Promise<T[]> {
  const reader = stream.getReader();
  const values: T[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) return values;
    values.push(value);
  }
}

/** Decodes every frame to a string. */
export async function texts(frames: AsyncIterable<Uint8Array>): Promise<string[]> {
  return (await collect(frames)).map(text);
}

/** Joins every encoded chunk into one string. */
export async function joined(chunks: AsyncIterable<Uint8Array>): Promise<string> {
  return text(concatBytes(await collect(chunks)));
}

/** Collects values until the iterable throws, returning both. */
export async function collectUntilError<T>(
  source: AsyncIterable<T>,
): Promise<{ values: T[]; error: unknown }> {
  const values: T[] = [];
  try {
    for await (const value of source) values.push(value);
  } catch (error) {
    return { values, error };
  }
  return { values, error: undefined };
}
