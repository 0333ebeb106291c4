import { InvalidStateError } from "../errors";
import { END, type IngestAction, NEEDS_MORE, type PollAction, type StateMachine, emit } from "./types";

export type MappingState = "running" | "finished";

/**
 * Maps every upstream value to exactly one downstream value; the end of the
 * upstream ends the output. Errors thrown by `fn` propagate from `ingest`.
 */
export class MappingMachine<In extends {}, Out> implements StateMachine<In, Out> {
  private _state: MappingState = "running";

  constructor(
    private readonly name: string,
    private readonly fn: (value: In) => Out,
  ) { }

  get state(): MappingState {
    return this._state;
  }

  poll(): PollAction<Out> {
    return this._state === "running" ? NEEDS_MORE : END;
  }

  ingest(value: In | null): IngestAction<Out> {
    if (this._state === "finished") throw new InvalidStateError(this.name, "ingest");
    if (value === null) {
      this._state = "finished";
      return END;
    }
    return emit(this.fn(value));
  }
}
