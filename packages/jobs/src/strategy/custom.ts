// packages/jobs/src/strategy/custom.ts

import { Effect, Option } from "effect";
import {
  EvaluationFailureError,
  UnresolvedConfigurationError,
  type CustomRetryError,
} from "../errors";
import type { Activity } from "../definitions";
import { RetryCycleSpec, parseCycle, parseRetryCycleSpec } from "../cycle/parser";
import { evaluateCycle } from "../cycle/duration-cycle";
import { selectInterval } from "../cycle/interval-selector";
import type { JobRecord } from "../services/job-store";
import { ExpressionEvaluator } from "../services/expression";
import { ExecutionRepository } from "../services/execution";
import { isFirstJobExecution } from "./mutation";

// =============================================================================
// Types
// =============================================================================

/**
 * A successfully resolved retry schedule.
 */
export interface RetryDecision {
  readonly lockExpirationTime: number;
  /** Counter before the decrement */
  readonly retries: number;
  /** Set when `retries` was seeded from configuration */
  readonly initializedRetries: Option.Option<number>;
}

// =============================================================================
// Expression Evaluation
// =============================================================================

const describeValue = (value: unknown): string =>
  value === null ? "null" : typeof value;

/**
 * Evaluate an activity's retry expression against the job's execution.
 * Only text is a usable result.
 */
const evaluateRetryExpression = (
  job: JobRecord,
  expression: string
): Effect.Effect<string, EvaluationFailureError, ExpressionEvaluator | ExecutionRepository> =>
  Effect.gen(function* () {
    const evaluator = yield* ExpressionEvaluator;
    const executions = yield* ExecutionRepository;

    const execution =
      job.executionId === undefined
        ? Option.none()
        : yield* executions.findExecution(job.executionId);

    const value = yield* evaluator.evaluate(expression, execution).pipe(
      Effect.mapError(
        (cause) => new EvaluationFailureError({ jobId: job.id, expression, cause })
      ),
      Effect.catchAllDefect((cause) =>
        Effect.fail(new EvaluationFailureError({ jobId: job.id, expression, cause }))
      )
    );

    if (typeof value !== "string") {
      return yield* new EvaluationFailureError({
        jobId: job.id,
        expression,
        cause: `expected text, got ${describeValue(value)}`,
      });
    }
    return value;
  });

// =============================================================================
// Resolution
// =============================================================================

/**
 * Find the retry cycle that applies to a job.
 *
 * Activity configuration wins; the global cycle covers jobs whose activity
 * is unknown or carries no configuration.
 */
const resolveSpec = (
  job: JobRecord,
  activity: Option.Option<Activity>,
  globalCycle: Option.Option<string>
): Effect.Effect<RetryCycleSpec, CustomRetryError, ExpressionEvaluator | ExecutionRepository> =>
  Effect.gen(function* () {
    const configuration = activity.pipe(
      Option.flatMap((a) => Option.fromNullable(a.retryConfiguration))
    );

    if (Option.isSome(configuration)) {
      const config = configuration.value;
      switch (config._tag) {
        case "Intervals":
          return RetryCycleSpec.Intervals({ intervals: config.intervals });
        case "Expression": {
          const text = yield* evaluateRetryExpression(job, config.expression);
          return yield* parseRetryCycleSpec(text);
        }
      }
    }

    if (Option.isSome(globalCycle)) {
      const cycle = yield* parseCycle(globalCycle.value);
      return RetryCycleSpec.Cycle({ cycle });
    }

    return yield* new UnresolvedConfigurationError({ jobId: job.id });
  });

/**
 * Resolve a job's retry schedule from configuration.
 *
 * Every way this can go wrong is in the error channel; the caller turns
 * each of them into the standard strategy.
 */
export const resolveCustom = (
  job: JobRecord,
  activity: Option.Option<Activity>,
  globalCycle: Option.Option<string>,
  now: number
): Effect.Effect<RetryDecision, CustomRetryError, ExpressionEvaluator | ExecutionRepository> =>
  Effect.gen(function* () {
    const spec = yield* resolveSpec(job, activity, globalCycle);
    const firstExecution = isFirstJobExecution(job);

    switch (spec._tag) {
      case "Intervals": {
        const { interval, retries } = selectInterval(
          spec.intervals,
          job.retries,
          firstExecution
        );
        const cycle = yield* evaluateCycle(interval, now);
        return {
          lockExpirationTime: cycle.dueAt,
          retries,
          initializedRetries: firstExecution ? Option.some(retries) : Option.none(),
        };
      }
      case "Cycle": {
        const cycle = yield* evaluateCycle(spec.cycle, now);
        const initializedRetries = firstExecution ? cycle.times : Option.none<number>();
        return {
          lockExpirationTime: cycle.dueAt,
          retries: Option.getOrElse(initializedRetries, () => job.retries),
          initializedRetries,
        };
      }
    }
  });
