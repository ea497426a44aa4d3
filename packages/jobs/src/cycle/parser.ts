// packages/jobs/src/cycle/parser.ts

import { Array as Arr, Data, DateTime, Effect, Option } from "effect";
import { MalformedCycleError } from "../errors";
import { parseIsoDuration, type IsoDuration } from "./iso-duration";

// =============================================================================
// Types
// =============================================================================

/**
 * Where a cycle's occurrences are counted from.
 *
 * - FromNow: `PT10M`, occurrences start at the evaluation instant
 * - FromStart: `2026-01-01T00:00:00Z/PT10M`
 * - Between: `2026-01-01T00:00:00Z/2026-01-01T06:00:00Z`, the period is the
 *   distance between both instants
 */
export type CycleAnchor = Data.TaggedEnum<{
  FromNow: { readonly period: IsoDuration };
  FromStart: { readonly start: number; readonly period: IsoDuration };
  Between: { readonly start: number; readonly end: number };
}>;

export const CycleAnchor = Data.taggedEnum<CycleAnchor>();

/**
 * A syntactically valid cycle. Evaluating it needs the current time.
 */
export interface ParsedCycle {
  readonly expression: string;
  /** `R<n>` prefix, if any */
  readonly repeat: Option.Option<number>;
  readonly anchor: CycleAnchor;
}

/**
 * A retry-cycle text, classified.
 */
export type RetryCycleSpec = Data.TaggedEnum<{
  Cycle: { readonly cycle: ParsedCycle };
  Intervals: { readonly intervals: Arr.NonEmptyReadonlyArray<ParsedCycle> };
}>;

export const RetryCycleSpec = Data.taggedEnum<RetryCycleSpec>();

export const INTERVAL_DELIMITER = ",";

// =============================================================================
// Parsing
// =============================================================================

const REPEAT = /^R(\d*)$/;
const INSTANT_PREFIX = /^\d{4}-\d{2}-\d{2}/;

const parseInstant = (text: string): Option.Option<number> =>
  INSTANT_PREFIX.test(text)
    ? DateTime.make(text).pipe(Option.map(DateTime.toEpochMillis))
    : Option.none();

const parseAnchor = (
  expression: string,
  parts: ReadonlyArray<string>
): Effect.Effect<CycleAnchor, MalformedCycleError> =>
  Effect.gen(function* () {
    const malformed = (reason: string) =>
      new MalformedCycleError({ expression, reason });

    if (parts.length === 0) {
      return yield* malformed("missing interval");
    }

    if (parts.length === 1) {
      const period = parseIsoDuration(parts[0]);
      if (Option.isNone(period)) {
        return yield* malformed(`"${parts[0]}" is not an ISO 8601 duration`);
      }
      return CycleAnchor.FromNow({ period: period.value });
    }

    if (parts.length !== 2) {
      return yield* malformed("expected at most two interval parts");
    }

    const [first, second] = parts;
    const start = parseInstant(first);
    if (Option.isNone(start)) {
      return yield* malformed(`interval must start with an instant, got "${first}"`);
    }

    const period = parseIsoDuration(second);
    if (Option.isSome(period)) {
      return CycleAnchor.FromStart({ start: start.value, period: period.value });
    }

    const end = parseInstant(second);
    if (Option.isNone(end)) {
      return yield* malformed(`"${second}" is neither a duration nor an instant`);
    }
    if (end.value <= start.value) {
      return yield* malformed("interval end must be after its start");
    }
    return CycleAnchor.Between({ start: start.value, end: end.value });
  });

/**
 * Parse a single cycle: `[R<n>/](duration | start/duration | start/end)`.
 */
export const parseCycle = (
  text: string
): Effect.Effect<ParsedCycle, MalformedCycleError> =>
  Effect.gen(function* () {
    const expression = text.trim();
    if (expression.length === 0) {
      return yield* new MalformedCycleError({ expression, reason: "empty expression" });
    }

    const parts = expression.split("/");
    const repeatMatch = REPEAT.exec(parts[0]);

    if (repeatMatch === null) {
      const anchor = yield* parseAnchor(expression, parts);
      return { expression, repeat: Option.none(), anchor };
    }

    const count = repeatMatch[1];
    if (count === "") {
      return yield* new MalformedCycleError({
        expression,
        reason: "unbounded repetition is not supported",
      });
    }
    const times = Number.parseInt(count, 10);
    if (!Number.isSafeInteger(times)) {
      return yield* new MalformedCycleError({
        expression,
        reason: "repeat count is too large",
      });
    }
    if (times < 1) {
      return yield* new MalformedCycleError({
        expression,
        reason: "repeat count must be a positive integer",
      });
    }

    const anchor = yield* parseAnchor(expression, parts.slice(1));
    return { expression, repeat: Option.some(times), anchor };
  });

/**
 * Parse a comma-separated list of cycles, kept in order.
 */
export const parseRetryIntervals = (
  text: string
): Effect.Effect<Arr.NonEmptyReadonlyArray<ParsedCycle>, MalformedCycleError> =>
  Effect.gen(function* () {
    const entries = text.split(INTERVAL_DELIMITER).map((entry) => entry.trim());
    if (entries.some((entry) => entry.length === 0)) {
      return yield* new MalformedCycleError({
        expression: text,
        reason: "interval list contains an empty entry",
      });
    }

    const intervals = yield* Effect.forEach(entries, parseCycle);
    if (!Arr.isNonEmptyReadonlyArray(intervals)) {
      return yield* new MalformedCycleError({
        expression: text,
        reason: "interval list is empty",
      });
    }
    return intervals;
  });

/**
 * Classify a retry-cycle text: a delimiter means an interval list, anything
 * else is one cycle.
 */
export const parseRetryCycleSpec = (
  text: string
): Effect.Effect<RetryCycleSpec, MalformedCycleError> =>
  text.includes(INTERVAL_DELIMITER)
    ? parseRetryIntervals(text).pipe(
        Effect.map((intervals) => RetryCycleSpec.Intervals({ intervals }))
      )
    : parseCycle(text).pipe(Effect.map((cycle) => RetryCycleSpec.Cycle({ cycle })));
