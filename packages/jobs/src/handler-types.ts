// packages/jobs/src/handler-types.ts

/**
 * Job handler type tags.
 */
export const HANDLER_TYPES = {
  TIMER_TRANSITION: "timer-transition",
  TIMER_INTERMEDIATE_TRANSITION: "timer-intermediate-transition",
  TIMER_START_EVENT: "timer-start-event",
  TIMER_START_EVENT_SUBPROCESS: "timer-start-event-subprocess",
  ASYNC_CONTINUATION: "async-continuation",
} as const;

export type SupportedHandlerType =
  (typeof HANDLER_TYPES)[keyof typeof HANDLER_TYPES];

/**
 * Handler types whose jobs point at an activity that may carry its own
 * retry configuration.
 */
export const SUPPORTED_HANDLER_TYPES: ReadonlySet<string> = new Set<string>(
  Object.values(HANDLER_TYPES)
);

export const isSupportedHandlerType = (
  type: string
): type is SupportedHandlerType => SUPPORTED_HANDLER_TYPES.has(type);
