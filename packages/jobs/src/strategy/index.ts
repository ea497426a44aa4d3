// packages/jobs/src/strategy/index.ts

export {
  JobRetryStrategy,
  JobRetryStrategyLayer,
  type JobRetryStrategyI,
} from "./orchestrator";
export { resolveCustom, type RetryDecision } from "./custom";
export { applyStandard } from "./standard";
export {
  RetryOutcome,
  MAX_EXCEPTION_MESSAGE_LENGTH,
  applyFailure,
  commitFailure,
  describeFailure,
  isFirstJobExecution,
  type FailureDetails,
} from "./mutation";
