export type {
  ActionType,
  ChangeId,
  ParentInfo,
  Plan,
  PlanMetadata,
  PlanMode,
  PlanSummary,
  PlanWarning,
  PlannedChange,
  Protection,
  ProtectionChange,
  ReferenceInfo,
} from './types.js';
export { UNKNOWN_ID } from './types.js';
