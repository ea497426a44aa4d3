// packages/core/src/adapters/memory/storage.ts

import { Effect } from "effect";
import type { StorageAdapterService } from "../storage";

/**
 * Map-backed storage adapter.
 *
 * Suitable for a single Node process, and for tests. Pass an existing map to
 * share records between adapters.
 */
export function createMemoryStorage(
  data: Map<string, unknown> = new Map(),
): StorageAdapterService {
  return {
    get: <T>(key: string) => Effect.sync(() => data.get(key) as T | undefined),

    put: <T>(key: string, value: T) =>
      Effect.sync(() => {
        data.set(key, value);
      }),

    putBatch: (entries: Record<string, unknown>) =>
      Effect.sync(() => {
        for (const [k, v] of Object.entries(entries)) {
          data.set(k, v);
        }
      }),

    delete: (key: string) =>
      Effect.sync(() => {
        const existed = data.has(key);
        data.delete(key);
        return existed;
      }),

    deleteAll: () =>
      Effect.sync(() => {
        data.clear();
      }),

    list: <T = unknown>(prefix: string) =>
      Effect.sync(() => {
        const result = new Map<string, T>();
        for (const [k, v] of data) {
          if (k.startsWith(prefix)) {
            result.set(k, v as T);
          }
        }
        return result;
      }),
  };
}
