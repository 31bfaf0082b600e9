/**
 * Lifecycle states of an action execution.
 */
export const EXECUTION_STATUSES = [
  "requested",
  "scheduled",
  "delayed",
  "running",
  "succeeded",
  "failed",
  "timeout",
  "abandoned",
  "canceling",
  "canceled",
  "pending",
  "pausing",
  "paused",
  "resuming",
] as const;

export type ExecutionStatus = typeof EXECUTION_STATUSES[number];

export const EXECUTION_STATUS_SUCCEEDED: ExecutionStatus = "succeeded";
export const EXECUTION_STATUS_FAILED: ExecutionStatus = "failed";

export function isExecutionStatus(value: unknown): value is ExecutionStatus {
  return typeof value === "string" && EXECUTION_STATUSES.some((status) => status === value);
}
