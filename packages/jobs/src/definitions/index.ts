// packages/jobs/src/definitions/index.ts

export type { Activity, ProcessDefinition } from "./process-definition";
export {
  RetryConfiguration,
  parseRetryConfiguration,
} from "./retry-configuration";
