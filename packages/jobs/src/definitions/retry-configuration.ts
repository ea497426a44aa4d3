// packages/jobs/src/definitions/retry-configuration.ts

import { type Array as Arr, Data, Effect } from "effect";
import type { MalformedCycleError } from "../errors";
import {
  INTERVAL_DELIMITER,
  parseRetryIntervals,
  type ParsedCycle,
} from "../cycle/parser";

/**
 * Retry configuration of an activity.
 *
 * - Intervals: ordered list, parsed at deployment
 * - Expression: resolved against the failing job's execution
 */
export type RetryConfiguration = Data.TaggedEnum<{
  Intervals: { readonly intervals: Arr.NonEmptyReadonlyArray<ParsedCycle> };
  Expression: { readonly expression: string };
}>;

export const RetryConfiguration = Data.taggedEnum<RetryConfiguration>();

const PLACEHOLDER = /[$#]\{/;

/**
 * Build a retry configuration from the text found in a process model.
 *
 * Text with a `${...}` or `#{...}` reference stays an expression. A
 * comma-separated list becomes an interval list. Anything else is an
 * expression that evaluates to itself.
 */
export const parseRetryConfiguration = (
  text: string
): Effect.Effect<RetryConfiguration, MalformedCycleError> => {
  const expression = text.trim();
  if (!PLACEHOLDER.test(expression) && expression.includes(INTERVAL_DELIMITER)) {
    return parseRetryIntervals(expression).pipe(
      Effect.map((intervals) => RetryConfiguration.Intervals({ intervals }))
    );
  }
  return Effect.succeed(RetryConfiguration.Expression({ expression }));
};
