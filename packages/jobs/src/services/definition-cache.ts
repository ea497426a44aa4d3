// packages/jobs/src/services/definition-cache.ts

import { Cache, Context, Duration, Effect, Layer, Option } from "effect";
import { DefinitionLookupError } from "../errors";
import type { Activity, ProcessDefinition } from "../definitions";

// =============================================================================
// Types
// =============================================================================

/**
 * Loads a deployed process definition by id.
 */
export type DefinitionLookup = (
  processDefinitionId: string
) => Effect.Effect<ProcessDefinition, DefinitionLookupError>;

export interface ProcessDefinitionCacheOptions {
  readonly lookup: DefinitionLookup;
  /** @default 1000 */
  readonly capacity?: number;
  /** @default "1 hour" */
  readonly timeToLive?: Duration.DurationInput;
}

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Read-through cache of deployed process definitions.
 *
 * Redeployment must call `invalidate` so the next lookup sees the new
 * activities. Failed lookups are cached for the same time to live.
 */
export interface ProcessDefinitionCacheI {
  readonly findActivity: (
    processDefinitionId: string,
    activityId: string
  ) => Effect.Effect<Option.Option<Activity>, DefinitionLookupError>;

  readonly invalidate: (processDefinitionId: string) => Effect.Effect<void>;

  readonly invalidateAll: () => Effect.Effect<void>;
}

// =============================================================================
// Service Tag
// =============================================================================

export class ProcessDefinitionCache extends Context.Tag(
  "@jobcycle/jobs/ProcessDefinitionCache"
)<ProcessDefinitionCache, ProcessDefinitionCacheI>() {}

// =============================================================================
// Implementation
// =============================================================================

export const ProcessDefinitionCacheLayer = (
  options: ProcessDefinitionCacheOptions
) =>
  Layer.effect(
    ProcessDefinitionCache,
    Effect.gen(function* () {
      const cache = yield* Cache.make({
        capacity: options.capacity ?? 1000,
        timeToLive: options.timeToLive ?? Duration.hours(1),
        lookup: options.lookup,
      });

      return {
        findActivity: (processDefinitionId: string, activityId: string) =>
          cache
            .get(processDefinitionId)
            .pipe(
              Effect.map((definition) =>
                Option.fromNullable(definition.activities[activityId])
              )
            ),

        invalidate: (processDefinitionId: string) =>
          cache.invalidate(processDefinitionId),

        invalidateAll: () => cache.invalidateAll,
      };
    })
  );

/**
 * Lookup over definitions held in memory. Unknown ids fail.
 */
export const staticDefinitionLookup = (
  definitions: Iterable<ProcessDefinition>
): DefinitionLookup => {
  const byId = new Map<string, ProcessDefinition>();
  for (const definition of definitions) {
    byId.set(definition.id, definition);
  }
  return (processDefinitionId) => {
    const definition = byId.get(processDefinitionId);
    return definition === undefined
      ? Effect.fail(
          new DefinitionLookupError({
            processDefinitionId,
            cause: "no such deployed definition",
          })
        )
      : Effect.succeed(definition);
  };
};
