// packages/core/src/tracker/index.ts

// Tracker service interface
export {
  EventTracker,
  emitEvent,
  flushEvents,
  getPendingEvents,
  type EventTrackerService,
  type BaseTrackingEvent,
} from "./tracker";

// No-op tracker
export { noopTracker, NoopTrackerLayer } from "./noop";

// Logger-backed tracker
export { createLoggingTracker, LoggingTrackerLayer } from "./logging";

// In-memory tracker (testing)
export {
  createInMemoryTracker,
  createInMemoryTrackerLayer,
  type InMemoryTrackerHandle,
} from "./in-memory";
