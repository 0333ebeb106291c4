import { type IngestAction, NEEDS_MORE, NOOP, type PollAction, type StateMachine } from "./types";

/** Feeds the output of `first` into `second`, behaving as one machine. */
export class ChainedMachine<A extends {}, B extends {}, C> implements StateMachine<A, C> {
  constructor(
    private readonly first: StateMachine<A, B>,
    private readonly second: StateMachine<B, C>,
  ) { }

  poll(): PollAction<C> {
    const action = this.second.poll();
    if (action.type !== "needsMore") return action;

    const upstream = this.first.poll();
    switch (upstream.type) {
      case "emit":
        return this.second.ingest(upstream.value);
      case "noop":
        return NOOP;
      case "needsMore":
        return NEEDS_MORE;
      case "error":
        return { type: "error", error: upstream.error };
      case "end":
        return this.second.ingest(null);
    }
  }

  ingest(value: A | null): IngestAction<C> {
    const result = this.first.ingest(value);
    switch (result.type) {
      case "emit":
        return this.second.ingest(result.value);
      case "noop":
        return NOOP;
      case "end":
        return this.second.ingest(null);
    }
  }
}
