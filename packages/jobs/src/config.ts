// packages/jobs/src/config.ts

import { Config, Context, Effect, Layer, Option } from "effect";
import type { LoggingOption } from "./services/job-logging";

// =============================================================================
// Types
// =============================================================================

/**
 * Options accepted when wiring retry handling by hand.
 */
export interface JobRetryOptions {
  /**
   * Engine-wide retry cycle, used when a job's activity has no retry
   * configuration of its own, e.g. "R3/PT5M".
   */
  readonly failedJobRetryTimeCycle?: string;

  /**
   * @default false (failures only)
   */
  readonly logging?: LoggingOption;
}

export interface JobRetryConfigI {
  readonly failedJobRetryTimeCycle: Option.Option<string>;
  readonly logging?: LoggingOption;
}

// =============================================================================
// Service Tag
// =============================================================================

export class JobRetryConfig extends Context.Tag("@jobcycle/jobs/JobRetryConfig")<
  JobRetryConfig,
  JobRetryConfigI
>() {}

// =============================================================================
// Layers
// =============================================================================

const normalizeCycle = (cycle: string | undefined): Option.Option<string> =>
  Option.fromNullable(cycle).pipe(
    Option.map((value) => value.trim()),
    Option.filter((value) => value.length > 0)
  );

export const JobRetryConfigLayer = (options: JobRetryOptions = {}) =>
  Layer.succeed(JobRetryConfig, {
    failedJobRetryTimeCycle: normalizeCycle(options.failedJobRetryTimeCycle),
    logging: options.logging,
  });

/**
 * Read configuration from the active ConfigProvider (environment by default):
 *
 * - FAILED_JOB_RETRY_TIME_CYCLE: engine-wide retry cycle
 * - JOB_RETRY_LOG_LEVEL: minimum log level, e.g. "Debug"
 */
export const JobRetryConfigFromEnv = Layer.effect(
  JobRetryConfig,
  Effect.gen(function* () {
    const cycle = yield* Config.option(Config.string("FAILED_JOB_RETRY_TIME_CYCLE"));
    const logLevel = yield* Config.option(Config.logLevel("JOB_RETRY_LOG_LEVEL"));

    return {
      failedJobRetryTimeCycle: normalizeCycle(Option.getOrUndefined(cycle)),
      logging: Option.getOrUndefined(logLevel),
    };
  })
);
