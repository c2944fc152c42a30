export { parseWorkItemMovement } from "./parser";
export { findWorkItemViolations, validateWorkItemMovement } from "./validation/validator";
export type { ColumnViolation } from "./validation/validator";
export { pointsChange } from "./types";
export type { WorkItem, WorkItemMovement } from "./types";
