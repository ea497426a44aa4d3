// packages/jobs/src/definitions/process-definition.ts

import type { RetryConfiguration } from "./retry-configuration";

/**
 * A node of a deployed process model.
 */
export interface Activity {
  readonly id: string;
  /** Failed-job retry configuration attached at deployment */
  readonly retryConfiguration?: RetryConfiguration;
}

/**
 * A deployed process definition, reduced to what retry handling needs.
 */
export interface ProcessDefinition {
  readonly id: string;
  readonly activities: Readonly<Record<string, Activity>>;
}
