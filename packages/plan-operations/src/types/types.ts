/**
 * Plan primitives shared between the planner that produces a plan and the
 * apply engine that executes it.
 *
 * A plan is produced once, upstream, and consumed by a single execution.
 * Field names mirror the serialized plan so that a parsed plan document can
 * be handed to the engine without translation.
 */

export type ActionType = 'CREATE' | 'UPDATE' | 'DELETE' | 'EXTERNAL_TOOL';

export type PlanMode = 'apply' | 'sync';

export type ChangeId = string;

/**
 * Sentinel used by the planner for identifiers of resources that will only
 * exist once an earlier change in the same plan has run.
 */
export const UNKNOWN_ID = '[unknown]';

/**
 * Protection transition. Only meaningful when `old !== new`.
 */
export interface ProtectionChange {
  old: boolean;
  new: boolean;
}

export type Protection = boolean | ProtectionChange;

export interface ReferenceInfo {
  ref: string;
  /** Resolved identifier; `[unknown]` or absent when not yet known. */
  id?: string;
  /** Resource-specific identifying fields, e.g. `{ name: 'dev-portal' }`. */
  lookupFields?: Record<string, string>;
}

export interface ParentInfo {
  ref: string;
  id?: string;
}

export interface PlannedChange {
  id: ChangeId;
  action: ActionType;
  resourceType: string;
  resourceRef: string;
  /** Required for UPDATE and DELETE. */
  resourceId?: string;
  /** Human-readable identifiers for resources without a config ref. */
  resourceMonikers?: Record<string, string>;
  fields: Record<string, unknown>;
  references?: Record<string, ReferenceInfo>;
  parent?: ParentInfo;
  protection?: Protection;
  namespace: string;
  configHash?: string;
  dependsOn?: ChangeId[];
}

export interface PlanMetadata {
  version: string;
  generatedAt: string;
  generator: string;
  mode: PlanMode;
}

export interface PlanSummary {
  totalChanges: number;
  byAction: Partial<Record<ActionType, number>>;
  byResource: Record<string, number>;
}

export interface PlanWarning {
  changeId: ChangeId;
  message: string;
}

export interface Plan {
  metadata: PlanMetadata;
  changes: PlannedChange[];
  /** Permutation of change ids in planner-computed dependency order. */
  executionOrder: ChangeId[];
  summary: PlanSummary;
  warnings?: PlanWarning[];
}
