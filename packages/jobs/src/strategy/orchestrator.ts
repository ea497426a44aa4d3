// packages/jobs/src/strategy/orchestrator.ts

import { Context, Effect, Either, Layer, Option } from "effect";
import {
  RuntimeAdapter,
  createJobRetryBaseEvent,
  emitEvent,
} from "@jobcycle/core";
import {
  DefinitionLookupError,
  JobNotFoundError,
  type CustomRetryError,
} from "../errors";
import { isSupportedHandlerType } from "../handler-types";
import type { Activity } from "../definitions";
import { JobRetryConfig } from "../config";
import { JobStore, type JobRecord } from "../services/job-store";
import { ProcessDefinitionCache } from "../services/definition-cache";
import { ExpressionEvaluator } from "../services/expression";
import { ExecutionRepository } from "../services/execution";
import { AcquisitionNotifier } from "../services/acquisition";
import { withLogSpan, withRetryLogging } from "../services/job-logging";
import { resolveCustom } from "./custom";
import { RetryOutcome, commitFailure } from "./mutation";
import { applyStandard } from "./standard";

// =============================================================================
// Service Interface
// =============================================================================

/**
 * JobRetryStrategy decides what happens to a job after it failed.
 *
 * `handleFailure` always completes: missing configuration, malformed cycles
 * and failing expressions all end in the standard strategy. A job that no
 * longer exists is reported and left alone.
 */
export interface JobRetryStrategyI {
  readonly handleFailure: (jobId: string, cause: unknown) => Effect.Effect<void>;
}

// =============================================================================
// Service Tag
// =============================================================================

export class JobRetryStrategy extends Context.Tag(
  "@jobcycle/jobs/JobRetryStrategy"
)<JobRetryStrategy, JobRetryStrategyI>() {}

// =============================================================================
// Implementation
// =============================================================================

type RetryServices =
  | JobStore
  | RuntimeAdapter
  | JobRetryConfig
  | ProcessDefinitionCache
  | ExpressionEvaluator
  | ExecutionRepository
  | AcquisitionNotifier;

type FallbackReason = "no_configuration" | "resolution_failed";

/**
 * The EventTracker, when present, is captured from the context the layer is
 * built in.
 */
export const JobRetryStrategyLayer = Layer.effect(
  JobRetryStrategy,
  Effect.gen(function* () {
    const store = yield* JobStore;
    const runtime = yield* RuntimeAdapter;
    const config = yield* JobRetryConfig;
    const definitions = yield* ProcessDefinitionCache;
    const context = yield* Effect.context<RetryServices>();

    const event = (jobId: string) =>
      runtime
        .now()
        .pipe(Effect.map((now) => createJobRetryBaseEvent(runtime.instanceId, jobId, now)));

    const fallback = (
      job: JobRecord,
      reason: FallbackReason,
      error?: CustomRetryError | DefinitionLookupError
    ) =>
      Effect.gen(function* () {
        yield* Effect.logDebug(`Falling back to standard retry strategy (${reason})`);
        yield* emitEvent({
          ...(yield* event(job.id)),
          type: "retry.fallbackApplied" as const,
          reason,
          ...(error !== undefined ? { errorTag: error._tag, error: error.message } : {}),
        });
        return RetryOutcome.Standard();
      });

    const degrade = (job: JobRecord, error: CustomRetryError) =>
      Effect.gen(function* () {
        if (error._tag === "EvaluationFailureError") {
          yield* Effect.logWarning(error.message);
          yield* emitEvent({
            ...(yield* event(job.id)),
            type: "retry.expressionFailed" as const,
            expression: error.expression,
            error: error.message,
          });
        }
        const reason: FallbackReason =
          error._tag === "UnresolvedConfigurationError"
            ? "no_configuration"
            : "resolution_failed";
        return yield* fallback(job, reason, error);
      });

    /**
     * Activity the job belongs to, for handler types that carry one.
     */
    const currentActivity = (
      job: JobRecord
    ): Effect.Effect<Option.Option<Activity>, DefinitionLookupError> => {
      const { processDefinitionId, activityId } = job;
      if (
        !isSupportedHandlerType(job.handlerType) ||
        processDefinitionId === undefined ||
        activityId === undefined
      ) {
        return Effect.succeed(Option.none());
      }
      return definitions.findActivity(processDefinitionId, activityId).pipe(
        Effect.catchAllDefect((cause) =>
          Effect.fail(new DefinitionLookupError({ processDefinitionId, cause }))
        )
      );
    };

    const decide = (job: JobRecord, now: number) =>
      Effect.gen(function* () {
        const activity = yield* Effect.either(currentActivity(job));
        if (Either.isLeft(activity)) {
          return yield* fallback(job, "resolution_failed", activity.left);
        }

        if (
          Option.isNone(activity.right) &&
          Option.isNone(config.failedJobRetryTimeCycle)
        ) {
          return yield* fallback(job, "no_configuration");
        }

        const resolved = yield* resolveCustom(
          job,
          activity.right,
          config.failedJobRetryTimeCycle,
          now
        ).pipe((effect) => withLogSpan(effect, "resolveRetryCycle"), Effect.either);

        if (Either.isLeft(resolved)) {
          return yield* degrade(job, resolved.left);
        }
        return RetryOutcome.Scheduled(resolved.right);
      });

    const reportMissing = (error: JobNotFoundError) =>
      Effect.gen(function* () {
        yield* Effect.logDebug(error.message);
        yield* emitEvent({ ...(yield* event(error.jobId)), type: "job.notFound" as const });
      });

    return {
      handleFailure: (jobId: string, cause: unknown) =>
        Effect.gen(function* () {
          const found = yield* store.find(jobId);
          if (Option.isNone(found)) {
            return yield* new JobNotFoundError({ jobId });
          }
          const job = found.value;
          const now = yield* runtime.now();
          const outcome = yield* decide(job, now);
          yield* outcome._tag === "Standard"
            ? applyStandard(job, cause)
            : commitFailure(job, outcome, cause);
        }).pipe(
          Effect.catchTag("JobNotFoundError", reportMissing),
          // Storage belongs to the surrounding unit of work
          Effect.catchTag("StorageError", (e) => Effect.die(e)),
          (effect) =>
            withRetryLogging(effect, {
              logging: config.logging,
              jobId,
              instanceId: runtime.instanceId,
            }),
          Effect.provide(context)
        ),
    };
  })
);
