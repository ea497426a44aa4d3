// packages/jobs/src/services/job-store.ts

import { Context, Effect, Layer, Option, Schema } from "effect";
import { StorageAdapter, StorageError } from "@jobcycle/core";
import { jobKey } from "../storage-keys";

// =============================================================================
// Types
// =============================================================================

/**
 * The fields of a job that retry handling reads and writes.
 */
export const JobRecord = Schema.Struct({
  id: Schema.String,
  /** Kind of work, e.g. "async-continuation" */
  handlerType: Schema.String,
  activityId: Schema.optional(Schema.String),
  processDefinitionId: Schema.optional(Schema.String),
  executionId: Schema.optional(Schema.String),
  retries: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
  lockOwner: Schema.optional(Schema.String),
  /** Epoch millis until which the job stays claimed */
  lockExpirationTime: Schema.optional(Schema.Finite),
  exceptionMessage: Schema.optional(Schema.String),
  /** Opaque reference to the recorded failure */
  exceptionStacktrace: Schema.optional(Schema.String),
});
export type JobRecord = typeof JobRecord.Type;

// =============================================================================
// Service Interface
// =============================================================================

/**
 * JobStore reads and writes job records.
 *
 * Records are validated on read and before every write; a value that does
 * not match `JobRecord` surfaces as a StorageError and is never stored.
 */
export interface JobStoreI {
  readonly find: (
    jobId: string
  ) => Effect.Effect<Option.Option<JobRecord>, StorageError>;

  readonly save: (job: JobRecord) => Effect.Effect<void, StorageError>;
}

// =============================================================================
// Service Tag
// =============================================================================

export class JobStore extends Context.Tag("@jobcycle/jobs/JobStore")<
  JobStore,
  JobStoreI
>() {}

// =============================================================================
// Implementation
// =============================================================================

const decodeJob = Schema.decodeUnknown(JobRecord);
const validateJob = Schema.validate(JobRecord);

export const JobStoreLayer = Layer.effect(
  JobStore,
  Effect.gen(function* () {
    const storage = yield* StorageAdapter;

    return {
      find: (jobId: string) =>
        Effect.gen(function* () {
          const key = jobKey(jobId);
          const raw = yield* storage.get<unknown>(key);
          if (raw === undefined) {
            return Option.none();
          }
          const job = yield* decodeJob(raw).pipe(
            Effect.mapError(
              (cause) => new StorageError({ operation: "get", key, cause })
            )
          );
          return Option.some(job);
        }),

      save: (job: JobRecord) => {
        const key = jobKey(job.id);
        return validateJob(job).pipe(
          Effect.mapError(
            (cause) => new StorageError({ operation: "put", key, cause })
          ),
          Effect.flatMap((valid) => storage.put(key, valid))
        );
      },
    };
  })
);
