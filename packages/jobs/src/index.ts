// packages/jobs/src/index.ts

// =============================================================================
// Retry Strategy
// =============================================================================

export {
  JobRetryStrategy,
  JobRetryStrategyLayer,
  resolveCustom,
  applyStandard,
  applyFailure,
  commitFailure,
  describeFailure,
  isFirstJobExecution,
  RetryOutcome,
  MAX_EXCEPTION_MESSAGE_LENGTH,
  type JobRetryStrategyI,
  type RetryDecision,
  type FailureDetails,
} from "./strategy";

export { makeJobRetryLayer, type JobRetryLayerOptions } from "./layer";

// =============================================================================
// Retry Cycles
// =============================================================================

export {
  parseIsoDuration,
  isIsoDuration,
  addIsoDuration,
  CycleAnchor,
  RetryCycleSpec,
  INTERVAL_DELIMITER,
  parseCycle,
  parseRetryIntervals,
  parseRetryCycleSpec,
  evaluateCycle,
  resolveCycle,
  selectInterval,
  type IsoDuration,
  type ParsedCycle,
  type DurationCycle,
  type IntervalSelection,
} from "./cycle";

// =============================================================================
// Definitions
// =============================================================================

export {
  RetryConfiguration,
  parseRetryConfiguration,
  type Activity,
  type ProcessDefinition,
} from "./definitions";

export {
  HANDLER_TYPES,
  SUPPORTED_HANDLER_TYPES,
  isSupportedHandlerType,
  type SupportedHandlerType,
} from "./handler-types";

// =============================================================================
// Services
// =============================================================================

export { JobStore, JobStoreLayer, JobRecord, type JobStoreI } from "./services/job-store";

export {
  ProcessDefinitionCache,
  ProcessDefinitionCacheLayer,
  staticDefinitionLookup,
  type ProcessDefinitionCacheI,
  type ProcessDefinitionCacheOptions,
  type DefinitionLookup,
} from "./services/definition-cache";

export {
  ExecutionRepository,
  ExecutionRepositoryLayer,
  type ExecutionContext,
  type ExecutionRepositoryI,
} from "./services/execution";

export {
  ExpressionEvaluator,
  ExpressionError,
  VariableExpressionEvaluatorLayer,
  variableExpressionEvaluator,
  type ExpressionEvaluatorI,
} from "./services/expression";

export {
  AcquisitionNotifier,
  AcquisitionNotifierLayer,
  type AcquisitionNotifierI,
  type AcquisitionSignal,
} from "./services/acquisition";

export {
  withRetryLogging,
  withLogSpan,
  resolveLogLevel,
  type LoggingOption,
  type RetryLoggingConfig,
} from "./services/job-logging";

// =============================================================================
// Configuration
// =============================================================================

export {
  JobRetryConfig,
  JobRetryConfigLayer,
  JobRetryConfigFromEnv,
  type JobRetryConfigI,
  type JobRetryOptions,
} from "./config";

// =============================================================================
// Errors
// =============================================================================

export {
  JobNotFoundError,
  MalformedCycleError,
  EvaluationFailureError,
  UnresolvedConfigurationError,
  DefinitionLookupError,
  StorageError,
  type CustomRetryError,
} from "./errors";
