// packages/core/src/adapters/memory/runtime.ts

import { Effect, Layer } from "effect";
import { StorageAdapter, type StorageAdapterService } from "../storage";
import { RuntimeAdapter, type RuntimeLayer } from "../runtime";
import { createMemoryStorage } from "./storage";

export interface MemoryRuntimeOptions {
  readonly instanceId: string;
  /**
   * Storage to use. Defaults to a fresh map-backed adapter.
   */
  readonly storage?: StorageAdapterService;
}

/**
 * Create a runtime layer for a plain Node process.
 *
 * Uses the wall clock. Bring your own storage adapter to persist job records
 * outside the process.
 */
export function createMemoryRuntime(options: MemoryRuntimeOptions): RuntimeLayer {
  const storageService = options.storage ?? createMemoryStorage();

  const runtimeService = {
    instanceId: options.instanceId,
    now: () => Effect.sync(() => Date.now()),
  };

  return Layer.mergeAll(
    Layer.succeed(StorageAdapter, storageService),
    Layer.succeed(RuntimeAdapter, runtimeService),
  );
}
