// packages/core/src/tracker/in-memory.ts

import { Effect, Layer, Ref } from "effect";
import { EventTracker, type EventTrackerService, type BaseTrackingEvent } from "./tracker";

/**
 * Read access to the events a test run recorded.
 */
export interface InMemoryTrackerHandle<E extends BaseTrackingEvent = BaseTrackingEvent> {
  readonly getEvents: () => Effect.Effect<E[]>;

  readonly getEventsByType: <T extends string>(
    type: T,
  ) => Effect.Effect<Array<Extract<E, { type: T }>>>;

  /**
   * Event types in emission order.
   */
  readonly getTypes: () => Effect.Effect<string[]>;

  readonly clear: () => Effect.Effect<void>;

  readonly hasEvent: (type: string) => Effect.Effect<boolean>;
}

/**
 * Create an in-memory tracker for testing.
 */
export function createInMemoryTracker<E extends BaseTrackingEvent = BaseTrackingEvent>(): Effect.Effect<{
  service: EventTrackerService<E>;
  handle: InMemoryTrackerHandle<E>;
}> {
  return Effect.gen(function* () {
    const events = yield* Ref.make<E[]>([]);

    const service: EventTrackerService<E> = {
      emit: (event) => Ref.update(events, (e) => [...e, event]),
      flush: () => Effect.void,
      pending: () => Ref.get(events).pipe(Effect.map((e) => e.length)),
    };

    const handle: InMemoryTrackerHandle<E> = {
      getEvents: () => Ref.get(events),

      getEventsByType: <T extends string>(type: T) =>
        Ref.get(events).pipe(
          Effect.map((e) =>
            e.filter((ev): ev is Extract<E, { type: T }> => ev.type === type),
          ),
        ),

      getTypes: () =>
        Ref.get(events).pipe(Effect.map((e) => e.map((ev) => ev.type))),

      clear: () => Ref.set(events, []),

      hasEvent: (type) =>
        Ref.get(events).pipe(
          Effect.map((e) => e.some((ev) => ev.type === type)),
        ),
    };

    return { service, handle };
  });
}

/**
 * Create an in-memory tracker layer plus its handle.
 */
export const createInMemoryTrackerLayer = <E extends BaseTrackingEvent = BaseTrackingEvent>() =>
  Effect.gen(function* () {
    const { service, handle } = yield* createInMemoryTracker<E>();
    const layer = Layer.succeed(EventTracker, service as EventTrackerService);
    return { layer, handle };
  });
