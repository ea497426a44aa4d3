// packages/core/src/tracker/tracker.ts

import { Context, Effect } from "effect";

// =============================================================================
// Base Event Type
// =============================================================================

/**
 * Minimum shape of every tracking event.
 */
export interface BaseTrackingEvent {
  /** Unique event ID for deduplication */
  readonly eventId: string;
  /** ISO timestamp when event occurred */
  readonly timestamp: string;
  /** Event type discriminator */
  readonly type: string;
}

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Sink for diagnostic events.
 *
 * @typeParam E - The event type, must extend BaseTrackingEvent
 */
export interface EventTrackerService<E extends BaseTrackingEvent = BaseTrackingEvent> {
  /**
   * Emit an event. May be buffered.
   */
  readonly emit: (event: E) => Effect.Effect<void>;

  /**
   * Flush buffered events.
   */
  readonly flush: () => Effect.Effect<void>;

  readonly pending: () => Effect.Effect<number>;
}

export class EventTracker extends Context.Tag("@jobcycle/core/EventTracker")<
  EventTracker,
  EventTrackerService
>() {}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Emit an event using the tracker from context.
 * Does nothing if no tracker is provided.
 */
export const emitEvent = <E extends BaseTrackingEvent>(
  event: E,
): Effect.Effect<void> =>
  Effect.flatMap(Effect.serviceOption(EventTracker), (option) =>
    option._tag === "Some" ? option.value.emit(event) : Effect.void,
  );

/**
 * Flush events using the tracker from context.
 */
export const flushEvents: Effect.Effect<void> = Effect.flatMap(
  Effect.serviceOption(EventTracker),
  (option) => (option._tag === "Some" ? option.value.flush() : Effect.void),
);

/**
 * Pending event count, 0 without a tracker.
 */
export const getPendingEvents: Effect.Effect<number> = Effect.flatMap(
  Effect.serviceOption(EventTracker),
  (option) => (option._tag === "Some" ? option.value.pending() : Effect.succeed(0)),
);
