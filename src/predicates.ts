import { DONE_SENTINEL } from "./constants";
import type { ContinuePredicate } from "./types";

/**
 * Builds a `continueWhile` predicate that stops the stream at the event whose data
 * equals `sentinel` (`[DONE]` unless given).
 */
export function untilDone(sentinel: string = DONE_SENTINEL): ContinuePredicate {
  return (data) => data !== sentinel;
}
