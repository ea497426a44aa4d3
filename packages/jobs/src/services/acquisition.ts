// packages/jobs/src/services/acquisition.ts

import { Context, Effect, Layer, PubSub, type Queue, type Scope } from "effect";

// =============================================================================
// Types
// =============================================================================

/**
 * Tells pollers that a job may be eligible again.
 */
export interface AcquisitionSignal {
  readonly jobId: string;
  /** Epoch millis when the signal was sent */
  readonly at: number;
}

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Wakes whatever acquires jobs, so a rescheduled job is picked up without
 * waiting for the next polling interval.
 */
export interface AcquisitionNotifierI {
  readonly notify: (signal: AcquisitionSignal) => Effect.Effect<void>;

  /**
   * Receive signals sent after subscribing, for the lifetime of the scope.
   */
  readonly subscribe: Effect.Effect<
    Queue.Dequeue<AcquisitionSignal>,
    never,
    Scope.Scope
  >;
}

// =============================================================================
// Service Tag
// =============================================================================

export class AcquisitionNotifier extends Context.Tag(
  "@jobcycle/jobs/AcquisitionNotifier"
)<AcquisitionNotifier, AcquisitionNotifierI>() {}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Broadcast signals to every subscriber. Slow subscribers drop the oldest
 * signals once `capacity` are queued.
 */
export const AcquisitionNotifierLayer = (capacity = 256) =>
  Layer.effect(
    AcquisitionNotifier,
    Effect.gen(function* () {
      const hub = yield* PubSub.sliding<AcquisitionSignal>(capacity);

      return {
        notify: (signal: AcquisitionSignal) =>
          PubSub.publish(hub, signal).pipe(Effect.asVoid),
        subscribe: PubSub.subscribe(hub),
      };
    })
  );
