// packages/jobs/test/strategy/orchestrator.test.ts

import { describe, it, expect } from "vitest";
import { Cause, Chunk, Effect, Exit, Layer, Option, Queue } from "effect";
import {
  RuntimeAdapter,
  StorageAdapter,
  StorageError,
  createInMemoryStorageWithHandle,
  createInMemoryTrackerLayer,
  createTestRuntime,
  type JobRetryEvent,
} from "@jobcycle/core";
import { JobRetryStrategy } from "../../src/strategy/orchestrator";
import { applyStandard } from "../../src/strategy/standard";
import { makeJobRetryLayer } from "../../src/layer";
import { JobRetryConfigLayer } from "../../src/config";
import { HANDLER_TYPES } from "../../src/handler-types";
import { JobStore, type JobRecord } from "../../src/services/job-store";
import { AcquisitionNotifier } from "../../src/services/acquisition";
import {
  ExecutionRepositoryLayer,
  type ExecutionContext,
} from "../../src/services/execution";
import { ExpressionEvaluator } from "../../src/services/expression";
import { staticDefinitionLookup } from "../../src/services/definition-cache";
import {
  RetryConfiguration,
  parseRetryConfiguration,
  type ProcessDefinition,
} from "../../src/definitions";

// =============================================================================
// Test Fixtures
// =============================================================================

const NOW = Date.parse("2026-03-10T12:00:00Z");
const MINUTE = 60 * 1000;

const invoice: ProcessDefinition = {
  id: "invoice:1",
  activities: {
    listed: {
      id: "listed",
      retryConfiguration: Effect.runSync(parseRetryConfiguration("PT5M,PT10M,PT20M")),
    },
    cycled: {
      id: "cycled",
      retryConfiguration: RetryConfiguration.Expression({ expression: "R3/PT10M" }),
    },
    dynamic: {
      id: "dynamic",
      retryConfiguration: RetryConfiguration.Expression({ expression: "${retryCycle}" }),
    },
    broken: {
      id: "broken",
      retryConfiguration: RetryConfiguration.Expression({ expression: "R/PT5M" }),
    },
    plain: { id: "plain" },
  },
};

const asyncJob = (
  id: string,
  activityId: string,
  overrides: Partial<JobRecord> = {}
): JobRecord => ({
  id,
  handlerType: HANDLER_TYPES.ASYNC_CONTINUATION,
  processDefinitionId: "invoice:1",
  activityId,
  executionId: "execution-1",
  retries: 3,
  lockOwner: "worker-1",
  lockExpirationTime: NOW + MINUTE,
  ...overrides,
});

// =============================================================================
// Harness
// =============================================================================

interface HarnessOptions {
  readonly jobs: ReadonlyArray<JobRecord>;
  readonly globalCycle?: string;
  readonly executions?: ReadonlyArray<ExecutionContext>;
  readonly evaluator?: Layer.Layer<ExpressionEvaluator>;
}

const createHarness = async (options: HarnessOptions) => {
  const { layer: runtime, handles } = createTestRuntime("test-instance", NOW);
  const { layer: tracker, handle: events } = await Effect.runPromise(
    createInMemoryTrackerLayer<JobRetryEvent>()
  );

  for (const job of options.jobs) {
    handles.storage.getData().set(`job:${job.id}`, job);
  }

  const layer = makeJobRetryLayer({
    runtime,
    definitions: { lookup: staticDefinitionLookup([invoice]) },
    executions: ExecutionRepositoryLayer(options.executions ?? []),
    config: JobRetryConfigLayer({ failedJobRetryTimeCycle: options.globalCycle }),
    evaluator: options.evaluator,
    tracker,
  });

  const run = <A, E>(
    effect: Effect.Effect<
      A,
      E,
      JobRetryStrategy | JobStore | AcquisitionNotifier | RuntimeAdapter
    >
  ) => Effect.runPromise(effect.pipe(Effect.provide(layer)));

  const fail = (jobId: string, cause: unknown = new Error("boom")) =>
    run(Effect.flatMap(JobRetryStrategy, (strategy) => strategy.handleFailure(jobId, cause)));

  const job = (jobId: string) =>
    run(Effect.flatMap(JobStore, (store) => store.find(jobId))).then(Option.getOrThrow);

  return { run, fail, job, events, handles };
};

// =============================================================================
// Tests
// =============================================================================

describe("JobRetryStrategy", () => {
  describe("interval lists", () => {
    it("walks the list and repeats the last interval", async () => {
      const { fail, job } = await createHarness({ jobs: [asyncJob("job-1", "listed")] });

      const seen: Array<{ retries: number; lockExpirationTime?: number }> = [];
      for (let i = 0; i < 4; i++) {
        await fail("job-1");
        const { retries, lockExpirationTime } = await job("job-1");
        seen.push({ retries, lockExpirationTime });
      }

      expect(seen).toEqual([
        { retries: 2, lockExpirationTime: NOW + 5 * MINUTE },
        { retries: 1, lockExpirationTime: NOW + 10 * MINUTE },
        { retries: 0, lockExpirationTime: NOW + 20 * MINUTE },
        { retries: 0, lockExpirationTime: NOW + 20 * MINUTE },
      ]);
    });

    it("seeds the counter from the list length on first failure", async () => {
      const { fail, job, events } = await createHarness({
        jobs: [asyncJob("job-1", "listed", { retries: 10 })],
      });

      await fail("job-1");

      expect((await job("job-1")).retries).toBe(2);
      expect(await Effect.runPromise(events.getTypes())).toEqual([
        "retry.initialized",
        "retry.decremented",
      ]);
      const [initialized] = await Effect.runPromise(
        events.getEventsByType("retry.initialized")
      );
      expect(initialized.retries).toBe(3);
    });

    it("reports exhaustion when the counter reaches zero", async () => {
      const { fail, events } = await createHarness({
        jobs: [
          asyncJob("job-1", "listed", {
            retries: 1,
            exceptionMessage: "earlier",
            exceptionStacktrace: "Error: earlier",
          }),
        ],
      });

      await fail("job-1", new Error("still failing"));

      expect(await Effect.runPromise(events.getTypes())).toEqual([
        "retry.decremented",
        "retry.exhausted",
      ]);
      const [exhausted] = await Effect.runPromise(events.getEventsByType("retry.exhausted"));
      expect(exhausted.exceptionMessage).toBe("still failing");
    });

    it("re-seeds a job whose failure record was cleared", async () => {
      const { fail, job } = await createHarness({
        jobs: [asyncJob("job-1", "listed", { retries: 1 })],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(2);
      expect(updated.lockExpirationTime).toBe(NOW + 5 * MINUTE);
    });
  });

  describe("retry cycles", () => {
    it("initializes the counter from the repeat count once", async () => {
      const { fail, job, events } = await createHarness({
        jobs: [asyncJob("job-1", "cycled", { retries: 5 })],
      });

      await fail("job-1");
      const first = await job("job-1");
      await fail("job-1");
      const second = await job("job-1");

      expect(first.retries).toBe(2);
      expect(first.lockExpirationTime).toBe(NOW + 10 * MINUTE);
      expect(second.retries).toBe(1);
      expect(second.lockExpirationTime).toBe(NOW + 10 * MINUTE);
      expect(
        (await Effect.runPromise(events.getEventsByType("retry.initialized"))).map(
          (e) => e.retries
        )
      ).toEqual([3]);
    });

    it("uses the global cycle for handler types without an activity", async () => {
      const { fail, job, events } = await createHarness({
        globalCycle: "PT1H",
        jobs: [
          {
            id: "job-1",
            handlerType: "message-correlation",
            retries: 3,
            lockOwner: "worker-1",
          },
        ],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(2);
      expect(updated.lockExpirationTime).toBe(NOW + 60 * MINUTE);
      expect(updated.lockOwner).toBe("worker-1");
      expect(await Effect.runPromise(events.getTypes())).toEqual(["retry.decremented"]);
    });

    it("uses the global cycle for an activity without configuration", async () => {
      const { fail, job } = await createHarness({
        globalCycle: "R4/PT2M",
        jobs: [asyncJob("job-1", "plain")],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(3);
      expect(updated.lockExpirationTime).toBe(NOW + 2 * MINUTE);
    });

    it("evaluates an expression against the execution", async () => {
      const { fail, job } = await createHarness({
        jobs: [asyncJob("job-1", "dynamic")],
        executions: [{ id: "execution-1", variables: { retryCycle: "R2/PT30M" } }],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(1);
      expect(updated.lockExpirationTime).toBe(NOW + 30 * MINUTE);
    });

    it("accepts an expression that yields an interval list", async () => {
      const { fail, job } = await createHarness({
        jobs: [asyncJob("job-1", "dynamic")],
        executions: [{ id: "execution-1", variables: { retryCycle: "PT1M,PT2M" } }],
      });

      await fail("job-1");
      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(0);
      expect(updated.lockExpirationTime).toBe(NOW + 2 * MINUTE);
    });
  });

  describe("fallback to the standard strategy", () => {
    it("unlocks and decrements without any configuration", async () => {
      const { fail, job, events } = await createHarness({
        jobs: [asyncJob("job-1", "plain")],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(2);
      expect(updated.lockOwner).toBeUndefined();
      expect(updated.lockExpirationTime).toBeUndefined();

      const [fallback] = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallback.reason).toBe("no_configuration");
      expect(fallback.errorTag).toBe("UnresolvedConfigurationError");

      const [decremented] = await Effect.runPromise(
        events.getEventsByType("retry.decremented")
      );
      expect(decremented.retries).toBe(2);
      expect(decremented.lockExpirationTime).toBeUndefined();
    });

    it("skips definition lookup for unsupported handler types", async () => {
      const { fail, events } = await createHarness({
        jobs: [
          {
            id: "job-1",
            handlerType: "message-correlation",
            processDefinitionId: "missing:1",
            activityId: "anything",
            retries: 3,
          },
        ],
      });

      await fail("job-1");

      const [fallback] = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallback.reason).toBe("no_configuration");
      expect(fallback.errorTag).toBeUndefined();
    });

    it("does not fall back to the global cycle when activity configuration is malformed", async () => {
      const { fail, job, events } = await createHarness({
        globalCycle: "PT1H",
        jobs: [asyncJob("job-1", "broken")],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(2);
      expect(updated.lockExpirationTime).toBeUndefined();

      const [fallback] = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallback).toMatchObject({
        reason: "resolution_failed",
        errorTag: "MalformedCycleError",
        error: 'Malformed retry cycle "R/PT5M": unbounded repetition is not supported',
      });
    });

    it("falls back when the global cycle is malformed", async () => {
      const { fail, job } = await createHarness({
        globalCycle: "every hour",
        jobs: [asyncJob("job-1", "plain")],
      });

      await fail("job-1");

      expect((await job("job-1")).lockExpirationTime).toBeUndefined();
    });

    it("falls back when the next occurrence is past the date range", async () => {
      const { fail, job, events } = await createHarness({
        globalCycle: "PT99999999999999H",
        jobs: [asyncJob("job-1", "plain")],
      });

      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(2);
      expect(updated.lockExpirationTime).toBeUndefined();

      const [fallback] = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallback).toMatchObject({
        errorTag: "MalformedCycleError",
        error: 'Malformed retry cycle "PT99999999999999H": occurrence out of range',
      });
    });

    it("keeps the job readable after an oversized repeat count", async () => {
      const { fail, job, events } = await createHarness({
        globalCycle: "R99999999999999999999/PT1M",
        jobs: [asyncJob("job-1", "plain")],
      });

      await fail("job-1");
      await fail("job-1");

      const updated = await job("job-1");
      expect(updated.retries).toBe(1);
      expect(updated.lockExpirationTime).toBeUndefined();

      const fallbacks = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallbacks).toHaveLength(2);
      expect(fallbacks[0]).toMatchObject({
        errorTag: "MalformedCycleError",
        error:
          'Malformed retry cycle "R99999999999999999999/PT1M": repeat count is too large',
      });
    });

    it("reports an expression without an execution", async () => {
      const { fail, job, events } = await createHarness({
        jobs: [asyncJob("job-1", "dynamic", { executionId: "execution-404" })],
      });

      await fail("job-1");

      expect((await job("job-1")).retries).toBe(2);
      expect(await Effect.runPromise(events.getTypes())).toEqual([
        "retry.expressionFailed",
        "retry.fallbackApplied",
        "retry.decremented",
      ]);
      const [failed] = await Effect.runPromise(
        events.getEventsByType("retry.expressionFailed")
      );
      expect(failed.expression).toBe("${retryCycle}");
      expect(failed.error).toBe(
        'Evaluating "${retryCycle}" for job job-1 failed: Cannot evaluate "${retryCycle}": cannot resolve "retryCycle" without an execution'
      );
    });

    it("rejects an expression that does not yield text", async () => {
      const { fail, events } = await createHarness({
        jobs: [asyncJob("job-1", "dynamic")],
        executions: [{ id: "execution-1", variables: { retryCycle: 42 } }],
      });

      await fail("job-1");

      const [failed] = await Effect.runPromise(
        events.getEventsByType("retry.expressionFailed")
      );
      expect(failed.error).toBe(
        'Evaluating "${retryCycle}" for job job-1 failed: expected text, got number'
      );
    });

    it("survives an evaluator that dies", async () => {
      const { fail, job, events } = await createHarness({
        jobs: [asyncJob("job-1", "cycled")],
        evaluator: Layer.succeed(ExpressionEvaluator, {
          evaluate: () => Effect.die(new Error("evaluator crashed")),
        }),
      });

      await fail("job-1");

      expect((await job("job-1")).retries).toBe(2);
      const [fallback] = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallback.errorTag).toBe("EvaluationFailureError");
    });

    it("falls back when the process definition is not deployed", async () => {
      const { fail, job, events } = await createHarness({
        globalCycle: "PT1H",
        jobs: [asyncJob("job-1", "listed", { processDefinitionId: "invoice:2" })],
      });

      await fail("job-1");

      expect((await job("job-1")).lockExpirationTime).toBeUndefined();
      const [fallback] = await Effect.runPromise(
        events.getEventsByType("retry.fallbackApplied")
      );
      expect(fallback).toMatchObject({
        reason: "resolution_failed",
        errorTag: "DefinitionLookupError",
      });
    });
  });

  describe("failure bookkeeping", () => {
    it("records a truncated message and the stack", async () => {
      const { fail, job } = await createHarness({ jobs: [asyncJob("job-1", "plain")] });
      const error = new Error("x".repeat(1000));

      await fail("job-1", error);

      const updated = await job("job-1");
      expect(updated.exceptionMessage).toBe("x".repeat(666));
      expect(updated.exceptionStacktrace).toBe(error.stack);
    });

    it("records a non-error cause as text", async () => {
      const { fail, job } = await createHarness({ jobs: [asyncJob("job-1", "plain")] });

      await fail("job-1", "connection reset");

      const updated = await job("job-1");
      expect(updated.exceptionMessage).toBe("connection reset");
      expect(updated.exceptionStacktrace).toBe("connection reset");
    });

    it("keeps an exhausted counter at zero", async () => {
      const { fail, job } = await createHarness({
        jobs: [asyncJob("job-1", "plain", { retries: 0 })],
      });

      await fail("job-1");

      expect((await job("job-1")).retries).toBe(0);
    });

    it("wakes acquisition after every failure", async () => {
      const { run } = await createHarness({ jobs: [asyncJob("job-1", "plain")] });

      const signals = await run(
        Effect.gen(function* () {
          const notifier = yield* AcquisitionNotifier;
          const strategy = yield* JobRetryStrategy;
          const queue = yield* notifier.subscribe;
          yield* strategy.handleFailure("job-1", new Error("boom"));
          return yield* Queue.takeAll(queue);
        }).pipe(Effect.scoped)
      );

      expect(Chunk.toReadonlyArray(signals)).toEqual([{ jobId: "job-1", at: NOW }]);
    });
  });

  describe("applyStandard", () => {
    it("unlocks and decrements without consulting configuration", async () => {
      const { run, job } = await createHarness({
        globalCycle: "PT1H",
        jobs: [asyncJob("job-1", "listed")],
      });

      const returned = await run(
        Effect.flatMap(JobStore, (store) => store.find("job-1")).pipe(
          Effect.map(Option.getOrThrow),
          Effect.flatMap((current) => applyStandard(current, new Error("boom")))
        )
      );

      const stored = await job("job-1");
      expect(stored).toEqual(returned);
      expect(stored.retries).toBe(2);
      expect(stored.lockOwner).toBeUndefined();
      expect(stored.lockExpirationTime).toBeUndefined();
      expect(stored.exceptionMessage).toBe("boom");
    });
  });

  describe("missing jobs", () => {
    it("reports the job and changes nothing", async () => {
      const { fail, events, handles } = await createHarness({ jobs: [] });

      await fail("ghost");

      expect(handles.storage.keys()).toEqual([]);
      const [missing] = await Effect.runPromise(events.getEventsByType("job.notFound"));
      expect(missing.jobId).toBe("ghost");
      expect(missing.instanceId).toBe("test-instance");
      expect(missing.timestamp).toBe("2026-03-10T12:00:00.000Z");
    });
  });

  describe("storage failures", () => {
    it("surfaces as a defect", async () => {
      const storage = createInMemoryStorageWithHandle();
      const runtime = Layer.mergeAll(
        Layer.succeed(StorageAdapter, {
          ...storage,
          get: () => Effect.fail(new StorageError({ operation: "get", cause: "disk full" })),
        }),
        Layer.succeed(RuntimeAdapter, {
          instanceId: "test-instance",
          now: () => Effect.succeed(NOW),
        })
      );
      const layer = makeJobRetryLayer({
        runtime,
        definitions: { lookup: staticDefinitionLookup([invoice]) },
        executions: ExecutionRepositoryLayer([]),
      });

      const exit = await Effect.runPromiseExit(
        Effect.flatMap(JobRetryStrategy, (strategy) =>
          strategy.handleFailure("job-1", new Error("boom"))
        ).pipe(Effect.provide(layer))
      );

      expect(Exit.isFailure(exit)).toBe(true);
      if (Exit.isFailure(exit)) {
        expect(Cause.isDie(exit.cause)).toBe(true);
      }
    });
  });
});
