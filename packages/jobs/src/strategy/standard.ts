// packages/jobs/src/strategy/standard.ts

import type { Effect } from "effect";
import type { RuntimeAdapter, StorageError } from "@jobcycle/core";
import type { JobStore, JobRecord } from "../services/job-store";
import type { AcquisitionNotifier } from "../services/acquisition";
import { RetryOutcome, commitFailure } from "./mutation";

/**
 * The always-available strategy: unlock, record the cause, decrement by
 * one, notify. The job is eligible again immediately.
 */
export const applyStandard = (
  job: JobRecord,
  cause: unknown
): Effect.Effect<JobRecord, StorageError, JobStore | RuntimeAdapter | AcquisitionNotifier> =>
  commitFailure(job, RetryOutcome.Standard(), cause);
