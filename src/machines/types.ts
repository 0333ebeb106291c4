/** What the driver should do after polling a state machine. */
export type PollAction<T> =
  | { readonly type: "emit"; readonly value: T }
  | { readonly type: "needsMore" }
  | { readonly type: "noop" }
  | { readonly type: "error"; readonly error: Error }
  | { readonly type: "end" };

/** What the driver should do after handing a state machine a new upstream value. */
export type IngestAction<T> =
  | { readonly type: "emit"; readonly value: T }
  | { readonly type: "noop" }
  | { readonly type: "end" };

/**
 * A pull-based transformation from upstream values to downstream values.
 *
 * `poll` is asked first; when it answers `needsMore`, the driver fetches one upstream
 * value and passes it to `ingest`, or `null` once the upstream is exhausted. `null`
 * is reserved for that signal, hence the non-nullable input type.
 */
export interface StateMachine<In extends {}, Out> {
  poll(): PollAction<Out>;
  ingest(value: In | null): IngestAction<Out>;
}

export const NEEDS_MORE = { type: "needsMore" } as const;
export const NOOP = { type: "noop" } as const;
export const END = { type: "end" } as const;

export const emit = <T>(value: T): { readonly type: "emit"; readonly value: T } => ({
  type: "emit",
  value,
});
