// packages/jobs/src/storage-keys.ts

/**
 * Storage key constants for job records.
 */
export const KEYS = {
  JOB: "job:", // prefix: job:{jobId}
} as const;

export const jobKey = (jobId: string): string => `${KEYS.JOB}${jobId}`;
