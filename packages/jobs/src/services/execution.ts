// packages/jobs/src/services/execution.ts

import { Context, Effect, Layer, Option } from "effect";

// =============================================================================
// Types
// =============================================================================

/**
 * Execution-scoped state an expression may read.
 */
export interface ExecutionContext {
  readonly id: string;
  readonly variables: Readonly<Record<string, unknown>>;
}

// =============================================================================
// Service Interface
// =============================================================================

export interface ExecutionRepositoryI {
  readonly findExecution: (
    executionId: string
  ) => Effect.Effect<Option.Option<ExecutionContext>>;
}

// =============================================================================
// Service Tag
// =============================================================================

export class ExecutionRepository extends Context.Tag(
  "@jobcycle/jobs/ExecutionRepository"
)<ExecutionRepository, ExecutionRepositoryI>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Repository over a fixed set of executions.
 */
export const ExecutionRepositoryLayer = (
  executions: Iterable<ExecutionContext>
) => {
  const byId = new Map<string, ExecutionContext>();
  for (const execution of executions) {
    byId.set(execution.id, execution);
  }
  return Layer.succeed(ExecutionRepository, {
    findExecution: (executionId: string) =>
      Effect.sync(() => Option.fromNullable(byId.get(executionId))),
  });
};
