// packages/jobs/src/layer.ts

import { Layer } from "effect";
import { NoopTrackerLayer, type EventTracker, type RuntimeLayer } from "@jobcycle/core";
import { JobRetryConfigLayer, type JobRetryConfig } from "./config";
import { JobStoreLayer } from "./services/job-store";
import {
  ProcessDefinitionCacheLayer,
  type ProcessDefinitionCacheOptions,
} from "./services/definition-cache";
import type { ExecutionRepository } from "./services/execution";
import {
  VariableExpressionEvaluatorLayer,
  type ExpressionEvaluator,
} from "./services/expression";
import { AcquisitionNotifierLayer } from "./services/acquisition";
import { JobRetryStrategyLayer } from "./strategy/orchestrator";

export interface JobRetryLayerOptions<E = never> {
  /** Clock, instance id and storage for job records */
  readonly runtime: RuntimeLayer;
  readonly definitions: ProcessDefinitionCacheOptions;
  readonly executions: Layer.Layer<ExecutionRepository>;
  /** @default JobRetryConfigLayer() (no global cycle, failures-only logging) */
  readonly config?: Layer.Layer<JobRetryConfig, E>;
  /** @default VariableExpressionEvaluatorLayer */
  readonly evaluator?: Layer.Layer<ExpressionEvaluator>;
  /** @default NoopTrackerLayer */
  readonly tracker?: Layer.Layer<EventTracker>;
  /** Queued wake signals per subscriber */
  readonly notifierCapacity?: number;
}

/**
 * Assemble everything `JobRetryStrategy` needs.
 *
 * The resulting layer also exposes the job store, definition cache and
 * acquisition notifier so the host can seed jobs, invalidate definitions on
 * redeployment, and subscribe to wake signals.
 *
 * @example
 * ```ts
 * const layer = makeJobRetryLayer({
 *   runtime: createMemoryRuntime({ instanceId: "worker-1" }),
 *   definitions: { lookup: staticDefinitionLookup(deployed) },
 *   executions: ExecutionRepositoryLayer([]),
 *   config: JobRetryConfigLayer({ failedJobRetryTimeCycle: "R5/PT1M" }),
 * });
 *
 * yield* Effect.gen(function* () {
 *   const strategy = yield* JobRetryStrategy;
 *   yield* strategy.handleFailure(jobId, error);
 * }).pipe(Effect.provide(layer));
 * ```
 */
export const makeJobRetryLayer = <E = never>(options: JobRetryLayerOptions<E>) => {
  const services = Layer.mergeAll(
    JobStoreLayer,
    ProcessDefinitionCacheLayer(options.definitions),
    AcquisitionNotifierLayer(options.notifierCapacity),
    options.executions,
    options.evaluator ?? VariableExpressionEvaluatorLayer,
    options.config ?? JobRetryConfigLayer(),
    options.tracker ?? NoopTrackerLayer
  ).pipe(Layer.provideMerge(options.runtime));

  return JobRetryStrategyLayer.pipe(Layer.provideMerge(services));
};
