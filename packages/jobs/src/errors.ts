// packages/jobs/src/errors.ts

import { Data } from "effect";

// Re-export core errors for convenience
export { StorageError } from "@jobcycle/core";

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * The failed job no longer exists in the store.
 */
export class JobNotFoundError extends Data.TaggedError("JobNotFoundError")<{
  readonly jobId: string;
}> {
  get message(): string {
    return `Job not found: ${this.jobId}`;
  }
}

/**
 * A retry cycle expression cannot be parsed, or yields no usable occurrence.
 */
export class MalformedCycleError extends Data.TaggedError("MalformedCycleError")<{
  readonly expression: string;
  readonly reason: string;
}> {
  get message(): string {
    return `Malformed retry cycle "${this.expression}": ${this.reason}`;
  }
}

/**
 * The expression evaluator failed or produced something other than text.
 */
export class EvaluationFailureError extends Data.TaggedError(
  "EvaluationFailureError"
)<{
  readonly jobId: string;
  readonly expression: string;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Evaluating "${this.expression}" for job ${this.jobId} failed: ${describeCause(this.cause)}`;
  }
}

/**
 * Neither an interval list nor a cycle expression could be obtained.
 * Not a fault: the caller applies the standard strategy.
 */
export class UnresolvedConfigurationError extends Data.TaggedError(
  "UnresolvedConfigurationError"
)<{
  readonly jobId: string;
}> {
  get message(): string {
    return `No retry configuration available for job ${this.jobId}`;
  }
}

/**
 * A process definition could not be loaded.
 */
export class DefinitionLookupError extends Data.TaggedError(
  "DefinitionLookupError"
)<{
  readonly processDefinitionId: string;
  readonly cause: unknown;
}> {
  get message(): string {
    return `Process definition ${this.processDefinitionId} unavailable: ${describeCause(this.cause)}`;
  }
}

/**
 * Failures the custom strategy can produce. Each one degrades to the
 * standard strategy.
 */
export type CustomRetryError =
  | MalformedCycleError
  | EvaluationFailureError
  | UnresolvedConfigurationError;
