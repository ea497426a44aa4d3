// packages/core/src/adapters/runtime.ts

import { Context, type Effect, type Layer } from "effect";
import type { StorageAdapter } from "./storage";

/**
 * Host runtime facts: who we are and what time it is.
 *
 * All time reads go through `now()` so tests can pin the clock.
 */
export interface RuntimeAdapterService {
  readonly instanceId: string;
  readonly now: () => Effect.Effect<number>;
}

export class RuntimeAdapter extends Context.Tag("@jobcycle/core/RuntimeAdapter")<
  RuntimeAdapter,
  RuntimeAdapterService
>() {}

/**
 * Everything a runtime layer provides.
 */
export type RuntimeLayer = Layer.Layer<StorageAdapter | RuntimeAdapter>;
