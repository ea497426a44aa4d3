// packages/core/src/tracker/logging.ts

import { Effect, Layer, LogLevel } from "effect";
import { EventTracker, type EventTrackerService, type BaseTrackingEvent } from "./tracker";

/**
 * Tracker that writes each event through the Effect logger.
 *
 * The event type is the log message; the remaining fields become
 * annotations. Nothing is buffered.
 */
export const createLoggingTracker = (
  level: LogLevel.LogLevel = LogLevel.Info,
): EventTrackerService => ({
  emit: (event: BaseTrackingEvent) => {
    const { type, ...fields } = event;
    return Effect.logWithLevel(level, type).pipe(Effect.annotateLogs(fields));
  },
  flush: () => Effect.void,
  pending: () => Effect.succeed(0),
});

export const LoggingTrackerLayer = (level?: LogLevel.LogLevel) =>
  Layer.succeed(EventTracker, createLoggingTracker(level));
