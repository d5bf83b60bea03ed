import type {
  ActionType,
  ChangeId,
  Plan,
  PlannedChange,
  Protection,
} from '@resctl/plan-operations';

import type { LabelMap } from './labels/labels.js';
import type { Logger } from './logging/logger.js';

export interface ResourceInfo {
  id: string;
  name: string;
  labels: LabelMap;
  normalizedLabels: LabelMap;
}

/**
 * Per-change data handed to adapters. `references` holds ids resolved for
 * this change only; the plan's own reference entries are left untouched.
 */
export interface ExecutionContext {
  change: PlannedChange;
  namespace: string;
  protection?: Protection;
  references: Record<string, string>;
  parentId?: string;
  dryRun: boolean;
  signal?: AbortSignal;
  logger: Logger;
}

export interface ResourceOperations<TCreate, TUpdate> {
  readonly resourceType: string;
  readonly requiredFields: readonly string[];
  readonly supportsUpdate: boolean;
  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): TCreate;
  mapUpdateFields(
    execContext: ExecutionContext,
    fields: Record<string, unknown>,
    currentLabels: LabelMap,
  ): TUpdate;
  create(request: TCreate, execContext: ExecutionContext): Promise<string>;
  update(id: string, request: TUpdate, execContext: ExecutionContext): Promise<string>;
  delete(id: string, execContext: ExecutionContext): Promise<void>;
  getByName(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined>;
  getById?(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined>;
}

/** Resources that are created and deleted but never updated in place. */
export interface CreateDeleteOperations<TCreate> {
  readonly resourceType: string;
  readonly requiredFields: readonly string[];
  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): TCreate;
  create(request: TCreate, execContext: ExecutionContext): Promise<string>;
  delete(id: string, execContext: ExecutionContext): Promise<void>;
  getByName?(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined>;
  getById?(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined>;
}

/** Resources that always exist under a parent and only accept updates. */
export interface SingletonOperations<TUpdate> {
  readonly resourceType: string;
  mapUpdateFields(execContext: ExecutionContext, fields: Record<string, unknown>): TUpdate;
  update(parentId: string, request: TUpdate, execContext: ExecutionContext): Promise<void>;
}

/** `UNKNOWN` marks an execution-order id that names no change in the plan. */
export type DescriptorAction = ActionType | 'UNKNOWN';

export interface ChangeDescriptor {
  changeId: ChangeId;
  resourceType: string;
  resourceName: string;
  resourceRef: string;
  action: DescriptorAction;
}

export interface ExecutionError extends ChangeDescriptor {
  error: string;
}

export interface ValidationResult extends ChangeDescriptor {
  status: 'would_succeed' | 'would_fail';
  validation: 'passed' | 'failed';
  message?: string;
}

export interface AppliedChange extends ChangeDescriptor {
  resourceId?: string;
}

export interface ExecutionResult {
  readonly successCount: number;
  readonly failureCount: number;
  readonly skippedCount: number;
  readonly errors: readonly ExecutionError[];
  readonly changesApplied: readonly AppliedChange[];
  readonly validationResults: readonly ValidationResult[];
  readonly dryRun: boolean;
}

/** Observational only; a reporter never influences execution. */
export interface ProgressReporter {
  startExecution(plan: Plan): void;
  startChange(change: PlannedChange): void;
  completeChange(change: PlannedChange, error?: Error): void;
  skipChange(change: PlannedChange, reason: string): void;
  finishExecution(result: ExecutionResult): void;
}

export interface ExecutionOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
  reporter?: ProgressReporter;
}

export interface Executor {
  execute(plan: Plan | null | undefined, options?: ExecutionOptions): Promise<ExecutionResult>;
}
