import type { StateMachine } from "./machines/types";
import type { ByteSource, EventSource } from "./types";

const ABORT_ERROR_NAME = "AbortError";
const ERROR_MSG_ABORTED = "Operation aborted";
const ERROR_MSG_RELEASE = "sluice: An unexpected error occurred while releasing the upstream.";

const abortReason = (signal: AbortSignal): unknown =>
  signal.reason ?? new DOMException(ERROR_MSG_ABORTED, ABORT_ERROR_NAME);

// A TypeError here means the stream was already closed or released.
const warnOnRelease = (error: unknown): void => {
  if (!(error instanceof TypeError)) {
    console.warn(ERROR_MSG_RELEASE, error);
  }
};

function isReadableStream<T>(value: unknown): value is ReadableStream<T> {
  return (
    typeof value === "object" &&
    value !== null &&
    "getReader" in value &&
    typeof value.getReader === "function"
  );
}

/**
 * Reads a ReadableStream through its reader. Leaving early cancels the stream,
 * and an abort of `signal` cancels it even while a read is pending.
 */
async function* readStream<T>(
  stream: ReadableStream<T>,
  signal?: AbortSignal,
): AsyncGenerator<T, void, undefined> {
  const reader = stream.getReader();
  let finished = false;

  const onAbort = () => {
    reader.cancel(signal?.reason).catch(warnOnRelease);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    while (true) {
      const { done, value } = await reader.read().catch((error: unknown) => {
        // An errored stream has nothing left to cancel.
        finished = true;
        throw error;
      });
      if (done) {
        finished = true;
        return;
      }
      yield value;
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (!finished) {
      await reader.cancel().catch(warnOnRelease);
    }
    reader.releaseLock();
  }
}

async function* fromIterable<T>(iterable: Iterable<T>): AsyncGenerator<T, void, undefined> {
  yield* iterable;
}

/** Normalizes any supported byte source to an async iterable of chunks. */
export function toAsyncIterable(source: ByteSource, signal?: AbortSignal): AsyncIterable<Uint8Array> {
  if (isReadableStream<Uint8Array>(source)) return readStream(source, signal);
  if (Symbol.asyncIterator in source) return source;
  return fromIterable(source);
}

/** Normalizes a sync or async iterable of values to an async iterable. */
export function toAsyncEvents<T>(source: EventSource<T>): AsyncIterable<T> {
  if (Symbol.asyncIterator in source) return source;
  return fromIterable(source);
}

function nextOrAbort<T>(
  iterator: AsyncIterator<T>,
  signal?: AbortSignal,
): Promise<IteratorResult<T>> {
  if (!signal) return iterator.next();
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    iterator.next().then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Runs a state machine against an upstream sequence, pulling one upstream value
 * at a time and only when the machine asks for more.
 *
 * The upstream is released (`return()`ed) when the machine ends early, when an
 * error is thrown, and when the consumer stops iterating.
 */
export async function* drive<In extends {}, Out>(
  machine: StateMachine<In, Out>,
  upstream: AsyncIterable<In>,
  signal?: AbortSignal,
): AsyncGenerator<Out, void, undefined> {
  const iterator = upstream[Symbol.asyncIterator]();
  let upstreamDone = false;

  try {
    while (true) {
      if (signal?.aborted) throw abortReason(signal);

      const action = machine.poll();
      switch (action.type) {
        case "emit":
          yield action.value;
          break;
        case "noop":
          break;
        case "error":
          throw action.error;
        case "end":
          return;
        case "needsMore": {
          const result = await nextOrAbort(iterator, signal);
          if (result.done) upstreamDone = true;
          const ingested = machine.ingest(result.done ? null : result.value);
          if (ingested.type === "end") return;
          if (ingested.type === "emit") yield ingested.value;
          break;
        }
      }
    }
  } finally {
    if (!upstreamDone && iterator.return) {
      if (signal?.aborted) {
        // A read may still be pending; do not wait for it.
        iterator.return().then(undefined, warnOnRelease);
      } else {
        await iterator.return();
      }
    }
  }
}

/** Gathers every value of an async iterable into an array. */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of source) values.push(value);
  return values;
}
