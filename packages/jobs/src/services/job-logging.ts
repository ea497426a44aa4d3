// packages/jobs/src/services/job-logging.ts

import { Effect, Logger, LogLevel } from "effect";

// =============================================================================
// Log Level Resolution
// =============================================================================

/**
 * How much retry handling logs.
 *
 * - false / undefined: failures only
 * - true: everything
 * - LogLevel: explicit minimum level
 */
export type LoggingOption = boolean | LogLevel.LogLevel;

/**
 * Resolve logging option to an Effect LogLevel.
 */
export const resolveLogLevel = (option?: LoggingOption): LogLevel.LogLevel => {
  if (option === undefined || option === false) {
    return LogLevel.Error;
  }
  if (option === true) {
    return LogLevel.Debug;
  }
  return option;
};

// =============================================================================
// Retry Logging Wrapper
// =============================================================================

export interface RetryLoggingConfig {
  readonly logging?: LoggingOption;
  readonly jobId: string;
  readonly instanceId: string;
}

/**
 * Wrap an effect with job-scoped logging.
 *
 * Every nested log carries the job id and instance id, and entries below the
 * configured level are dropped.
 *
 * @example
 * ```ts
 * yield* withRetryLogging(
 *   Effect.logDebug("Decrementing retries"),
 *   { logging: config.logging, jobId: job.id, instanceId: runtime.instanceId }
 * );
 * ```
 */
export const withRetryLogging = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  config: RetryLoggingConfig
): Effect.Effect<A, E, R> =>
  effect.pipe(
    Effect.annotateLogs({
      jobId: config.jobId,
      instanceId: config.instanceId,
    }),
    Logger.withMinimumLogLevel(resolveLogLevel(config.logging))
  );

// =============================================================================
// Log Span Helper
// =============================================================================

/**
 * Wrap an effect with a log span so nested logs report its duration.
 */
export const withLogSpan = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
  spanName: string
): Effect.Effect<A, E, R> => effect.pipe(Effect.withLogSpan(spanName));
