// packages/core/src/adapters/storage.ts

import { Context, type Effect } from "effect";
import type { StorageError } from "../errors";

/**
 * Key-value storage used by the job store.
 *
 * Implementations decide where records live. The core only relies on
 * read-your-writes within a single unit of work.
 */
export interface StorageAdapterService {
  readonly get: <T>(key: string) => Effect.Effect<T | undefined, StorageError>;

  readonly put: <T>(key: string, value: T) => Effect.Effect<void, StorageError>;

  readonly putBatch: (
    entries: Record<string, unknown>,
  ) => Effect.Effect<void, StorageError>;

  /**
   * Returns true if the key existed.
   */
  readonly delete: (key: string) => Effect.Effect<boolean, StorageError>;

  readonly deleteAll: () => Effect.Effect<void, StorageError>;

  readonly list: <T = unknown>(
    prefix: string,
  ) => Effect.Effect<Map<string, T>, StorageError>;
}

export class StorageAdapter extends Context.Tag("@jobcycle/core/StorageAdapter")<
  StorageAdapter,
  StorageAdapterService
>() {}
