export type { ExecutionStatus } from "./action_status";
export {
  EXECUTION_STATUSES,
  EXECUTION_STATUS_SUCCEEDED,
  EXECUTION_STATUS_FAILED,
  isExecutionStatus,
} from "./action_status";
export { MASKED_ATTRIBUTE_VALUE } from "./secrets";
