// packages/jobs/src/cycle/interval-selector.ts

import { Array as Arr } from "effect";

export interface IntervalSelection<A> {
  readonly interval: A;
  /** Counter the selection was made with; the list length on first execution */
  readonly retries: number;
}

/**
 * Pick the interval for the current attempt.
 *
 * The first failure consumes `list[0]`, the second `list[1]`, and so on.
 * Once failures outnumber the configured intervals the last one repeats.
 */
export const selectInterval = <A>(
  list: Arr.NonEmptyReadonlyArray<A>,
  remainingRetries: number,
  isFirstExecution: boolean
): IntervalSelection<A> => {
  const retries = isFirstExecution ? list.length : remainingRetries;
  const index = list.length - retries;
  const interval =
    index >= 0 && index < list.length ? list[index] : Arr.lastNonEmpty(list);
  return { interval, retries };
};
