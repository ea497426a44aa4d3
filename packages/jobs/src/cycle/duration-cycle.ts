// packages/jobs/src/cycle/duration-cycle.ts

import { Effect, Either, Option } from "effect";
import { MalformedCycleError } from "../errors";
import {
  addIsoDuration,
  fixedLengthMillis,
  isRepresentableInstant,
} from "./iso-duration";
import { CycleAnchor, parseCycle, type ParsedCycle } from "./parser";

/**
 * A cycle evaluated against a point in time.
 */
export interface DurationCycle {
  /** Next occurrence, epoch millis */
  readonly dueAt: number;
  /** `dueAt - now` */
  readonly durationMs: number;
  /** Repeat count of an `R<n>` cycle; seeds the retry counter */
  readonly times: Option.Option<number>;
}

const OUT_OF_RANGE = "occurrence out of range";

const startOf = (anchor: CycleAnchor, now: number): number =>
  anchor._tag === "FromNow" ? now : anchor.start;

const step = (anchor: CycleAnchor, from: number): Option.Option<number> => {
  switch (anchor._tag) {
    case "FromNow":
    case "FromStart":
      return addIsoDuration(from, anchor.period);
    case "Between":
      return Option.some(from + (anchor.end - anchor.start)).pipe(
        Option.filter(isRepresentableInstant)
      );
  }
};

/**
 * Period in millis when every step has the same length.
 */
const fixedPeriod = (anchor: CycleAnchor): Option.Option<number> =>
  anchor._tag === "Between"
    ? Option.some(anchor.end - anchor.start)
    : fixedLengthMillis(anchor.period);

/**
 * Next occurrence of a repeating cycle strictly after `now`; the left side
 * carries why there is none.
 *
 * A start in the future is itself the next occurrence. Otherwise occurrences
 * are `start + k * period` for k = 1..times. Fixed-length periods jump
 * straight to k; calendar periods are stepped.
 */
const nextRepeat = (
  anchor: CycleAnchor,
  times: number,
  now: number
): Either.Either<number, string> => {
  const start = startOf(anchor, now);
  if (start > now) {
    return Either.right(start);
  }
  const exhausted = Either.left(`all ${times} occurrences are in the past`);

  const period = fixedPeriod(anchor);
  if (Option.isSome(period)) {
    if (period.value <= 0) {
      return exhausted;
    }
    const k = Math.floor((now - start) / period.value) + 1;
    if (k > times) {
      return exhausted;
    }
    const dueAt = start + k * period.value;
    return isRepresentableInstant(dueAt) ? Either.right(dueAt) : Either.left(OUT_OF_RANGE);
  }

  let current = start;
  for (let i = 0; i < times; i++) {
    const next = step(anchor, current);
    if (Option.isNone(next)) {
      return Either.left(OUT_OF_RANGE);
    }
    current = next.value;
    if (current > now) {
      return Either.right(current);
    }
  }
  return exhausted;
};

/**
 * Evaluate a parsed cycle at `now`.
 *
 * Pure in its arguments: the same cycle at the same instant always yields
 * the same result.
 */
export const evaluateCycle = (
  cycle: ParsedCycle,
  now: number
): Effect.Effect<DurationCycle, MalformedCycleError> =>
  Effect.gen(function* () {
    const { anchor, expression } = cycle;

    if (Option.isNone(cycle.repeat)) {
      const dueAt =
        anchor._tag === "Between"
          ? Option.some(anchor.end)
          : step(anchor, startOf(anchor, now));
      if (Option.isNone(dueAt)) {
        return yield* new MalformedCycleError({ expression, reason: OUT_OF_RANGE });
      }
      return {
        dueAt: dueAt.value,
        durationMs: dueAt.value - now,
        times: Option.none(),
      };
    }

    const times = cycle.repeat.value;
    const dueAt = nextRepeat(anchor, times, now);
    if (Either.isLeft(dueAt)) {
      return yield* new MalformedCycleError({ expression, reason: dueAt.left });
    }
    return {
      dueAt: dueAt.right,
      durationMs: dueAt.right - now,
      times: Option.some(times),
    };
  });

/**
 * Parse and evaluate a single cycle expression.
 */
export const resolveCycle = (
  expression: string,
  now: number
): Effect.Effect<DurationCycle, MalformedCycleError> =>
  parseCycle(expression).pipe(Effect.flatMap((cycle) => evaluateCycle(cycle, now)));
