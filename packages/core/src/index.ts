// Errors
export { StorageError } from "./errors";

// Event Schemas
export {
  createJobRetryBaseEvent,
  JobRetryBaseEventSchema,
  JobNotFoundEventSchema,
  RetryFallbackAppliedEventSchema,
  RetryExpressionFailedEventSchema,
  RetryInitializedEventSchema,
  RetriesDecrementedEventSchema,
  RetryExhaustedEventSchema,
  JobRetryEventSchema,
  type JobRetryBaseEvent,
  type JobNotFoundEvent,
  type RetryFallbackAppliedEvent,
  type RetryExpressionFailedEvent,
  type RetryInitializedEvent,
  type RetriesDecrementedEvent,
  type RetryExhaustedEvent,
  type JobRetryEvent,
  type JobRetryEventType,
} from "./events";

// Adapters
export {
  StorageAdapter,
  type StorageAdapterService,
  RuntimeAdapter,
  type RuntimeAdapterService,
  type RuntimeLayer,
  createMemoryRuntime,
  type MemoryRuntimeOptions,
} from "./adapters";

// Tracker
export {
  EventTracker,
  emitEvent,
  flushEvents,
  getPendingEvents,
  noopTracker,
  NoopTrackerLayer,
  createLoggingTracker,
  LoggingTrackerLayer,
  createInMemoryTracker,
  createInMemoryTrackerLayer,
  type EventTrackerService,
  type BaseTrackingEvent,
  type InMemoryTrackerHandle,
} from "./tracker";

// Testing
export {
  createInMemoryStorageWithHandle,
  createTestRuntime,
  type InMemoryStorageHandle,
  type InMemoryRuntimeHandles,
} from "./testing";
