// packages/jobs/src/strategy/mutation.ts

import { Data, Effect, Option } from "effect";
import {
  RuntimeAdapter,
  createJobRetryBaseEvent,
  emitEvent,
  type StorageError,
} from "@jobcycle/core";
import { JobStore, type JobRecord } from "../services/job-store";
import { AcquisitionNotifier } from "../services/acquisition";

// =============================================================================
// Types
// =============================================================================

/**
 * Recorded exception messages are cut to this many characters.
 */
export const MAX_EXCEPTION_MESSAGE_LENGTH = 666;

/**
 * What a processed failure does to the job's schedule.
 *
 * - Standard: unlock, eligible again right away
 * - Scheduled: stay locked until `lockExpirationTime`; `retries` is the
 *   counter before the decrement, `initializedRetries` is set when it was
 *   seeded from configuration
 */
export type RetryOutcome = Data.TaggedEnum<{
  Standard: {};
  Scheduled: {
    readonly lockExpirationTime: number;
    readonly retries: number;
    readonly initializedRetries: Option.Option<number>;
  };
}>;

export const RetryOutcome = Data.taggedEnum<RetryOutcome>();

export interface FailureDetails {
  readonly message: string;
  readonly stacktrace: string;
}

// =============================================================================
// Pure Helpers
// =============================================================================

/**
 * A job without a recorded failure is failing for the first time. Jobs that
 * never failed cannot carry a cause, since a success completes the job.
 */
export const isFirstJobExecution = (job: JobRecord): boolean =>
  job.exceptionStacktrace === undefined && job.exceptionMessage === undefined;

export const describeFailure = (cause: unknown): FailureDetails => {
  if (cause instanceof Error) {
    return {
      message: cause.message,
      stacktrace: cause.stack ?? `${cause.name}: ${cause.message}`,
    };
  }
  const text = String(cause);
  return { message: text, stacktrace: text };
};

const decrement = (retries: number): number => Math.max(0, retries - 1);

/**
 * Apply one failure to a job record: record the cause, decrement the retry
 * counter, then either unlock or move the lock expiration.
 */
export const applyFailure = (
  job: JobRecord,
  outcome: RetryOutcome,
  failure: FailureDetails
): JobRecord => {
  const recorded: JobRecord = {
    ...job,
    exceptionMessage: failure.message.slice(0, MAX_EXCEPTION_MESSAGE_LENGTH),
    exceptionStacktrace: failure.stacktrace,
  };

  switch (outcome._tag) {
    case "Standard":
      return {
        ...recorded,
        lockOwner: undefined,
        lockExpirationTime: undefined,
        retries: decrement(job.retries),
      };
    case "Scheduled":
      return {
        ...recorded,
        lockExpirationTime: outcome.lockExpirationTime,
        retries: decrement(outcome.retries),
      };
  }
};

// =============================================================================
// Commit
// =============================================================================

/**
 * Persist a processed failure and tell everyone about it.
 *
 * Both strategies end here, so a failure always records its cause,
 * decrements once, notifies acquisition, and logs.
 */
export const commitFailure = (
  job: JobRecord,
  outcome: RetryOutcome,
  cause: unknown
): Effect.Effect<JobRecord, StorageError, JobStore | RuntimeAdapter | AcquisitionNotifier> =>
  Effect.gen(function* () {
    const store = yield* JobStore;
    const runtime = yield* RuntimeAdapter;
    const notifier = yield* AcquisitionNotifier;
    const now = yield* runtime.now();

    const updated = applyFailure(job, outcome, describeFailure(cause));
    yield* store.save(updated);

    const base = () => createJobRetryBaseEvent(runtime.instanceId, job.id, now);

    if (outcome._tag === "Scheduled" && Option.isSome(outcome.initializedRetries)) {
      const retries = outcome.initializedRetries.value;
      yield* Effect.logDebug(`Initially applying retry cycle: ${retries} retries`);
      yield* emitEvent({ ...base(), type: "retry.initialized" as const, retries });
    }

    yield* Effect.logDebug(`Decrementing retries to ${updated.retries}`);
    yield* emitEvent({
      ...base(),
      type: "retry.decremented" as const,
      retries: updated.retries,
      ...(updated.lockExpirationTime !== undefined
        ? { lockExpirationTime: updated.lockExpirationTime }
        : {}),
    });

    if (updated.retries === 0) {
      yield* Effect.logInfo("Retries exhausted");
      yield* emitEvent({
        ...base(),
        type: "retry.exhausted" as const,
        exceptionMessage: updated.exceptionMessage,
      });
    }

    yield* notifier.notify({ jobId: job.id, at: now });
    return updated;
  });
