/**
 * Tracking events for job retry handling.
 *
 * Every failure the retry strategy processes emits a small, fixed set of
 * events. They are defined as Effect Schemas so sinks can validate what they
 * receive.
 */

import { Schema } from "effect";
import { v7 as uuidv7 } from "uuid";

// =============================================================================
// Base Fields
// =============================================================================

const JobRetryBaseFields = {
  /** Unique event ID for deduplication */
  eventId: Schema.String,
  /** ISO timestamp when event occurred */
  timestamp: Schema.String,
  source: Schema.Literal("job"),
  /** Runtime instance that handled the failure */
  instanceId: Schema.String,
  jobId: Schema.String,
};

export const JobRetryBaseEventSchema = Schema.Struct(JobRetryBaseFields);
export type JobRetryBaseEvent = Schema.Schema.Type<typeof JobRetryBaseEventSchema>;

// =============================================================================
// Events
// =============================================================================

/**
 * The failed job no longer exists. Nothing was changed.
 */
export const JobNotFoundEventSchema = Schema.Struct({
  ...JobRetryBaseFields,
  type: Schema.Literal("job.notFound"),
});
export type JobNotFoundEvent = Schema.Schema.Type<typeof JobNotFoundEventSchema>;

/**
 * The standard strategy was used instead of a configured retry cycle.
 */
export const RetryFallbackAppliedEventSchema = Schema.Struct({
  ...JobRetryBaseFields,
  type: Schema.Literal("retry.fallbackApplied"),
  /**
   * - no_configuration: neither an activity nor a global cycle applies
   * - resolution_failed: configuration exists but could not be used
   */
  reason: Schema.Literal("no_configuration", "resolution_failed"),
  /** Tag of the error that caused the fallback */
  errorTag: Schema.optional(Schema.String),
  error: Schema.optional(Schema.String),
});
export type RetryFallbackAppliedEvent = Schema.Schema.Type<
  typeof RetryFallbackAppliedEventSchema
>;

/**
 * A retry cycle expression could not be evaluated.
 */
export const RetryExpressionFailedEventSchema = Schema.Struct({
  ...JobRetryBaseFields,
  type: Schema.Literal("retry.expressionFailed"),
  expression: Schema.String,
  error: Schema.String,
});
export type RetryExpressionFailedEvent = Schema.Schema.Type<
  typeof RetryExpressionFailedEventSchema
>;

/**
 * The retry counter was seeded from configuration on the first failure.
 */
export const RetryInitializedEventSchema = Schema.Struct({
  ...JobRetryBaseFields,
  type: Schema.Literal("retry.initialized"),
  retries: Schema.Number,
});
export type RetryInitializedEvent = Schema.Schema.Type<typeof RetryInitializedEventSchema>;

/**
 * The retry counter was decremented. Emitted once per processed failure.
 */
export const RetriesDecrementedEventSchema = Schema.Struct({
  ...JobRetryBaseFields,
  type: Schema.Literal("retry.decremented"),
  /** Counter after the decrement */
  retries: Schema.Number,
  /** When the job becomes eligible again; absent when it was unlocked */
  lockExpirationTime: Schema.optional(Schema.Number),
});
export type RetriesDecrementedEvent = Schema.Schema.Type<
  typeof RetriesDecrementedEventSchema
>;

/**
 * The retry counter reached zero.
 */
export const RetryExhaustedEventSchema = Schema.Struct({
  ...JobRetryBaseFields,
  type: Schema.Literal("retry.exhausted"),
  exceptionMessage: Schema.optional(Schema.String),
});
export type RetryExhaustedEvent = Schema.Schema.Type<typeof RetryExhaustedEventSchema>;

// =============================================================================
// Combined
// =============================================================================

export const JobRetryEventSchema = Schema.Union(
  JobNotFoundEventSchema,
  RetryFallbackAppliedEventSchema,
  RetryExpressionFailedEventSchema,
  RetryInitializedEventSchema,
  RetriesDecrementedEventSchema,
  RetryExhaustedEventSchema,
);
export type JobRetryEvent = Schema.Schema.Type<typeof JobRetryEventSchema>;
export type JobRetryEventType = JobRetryEvent["type"];

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Create the base fields for a job retry event.
 *
 * @param now - Event time in epoch millis, usually from the runtime clock
 */
export function createJobRetryBaseEvent(
  instanceId: string,
  jobId: string,
  now: number,
): JobRetryBaseEvent {
  return {
    eventId: uuidv7(),
    timestamp: new Date(now).toISOString(),
    source: "job" as const,
    instanceId,
    jobId,
  };
}
