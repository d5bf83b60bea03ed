import type {
  ActionType,
  ChangeId,
  ParentInfo,
  Plan,
  PlanMode,
  PlanSummary,
  PlannedChange,
  Protection,
  ReferenceInfo,
} from './types/index.js';

export interface ChangeOptions {
  id?: ChangeId;
  namespace?: string;
  references?: Record<string, ReferenceInfo>;
  parent?: ParentInfo;
  protection?: Protection;
  resourceMonikers?: Record<string, string>;
  configHash?: string;
  dependsOn?: ChangeId[];
}

export interface PlanBuilderOptions {
  mode?: PlanMode;
  version?: string;
  generator?: string;
  now?: () => Date;
}

const ACTION_PREFIX: Record<ActionType, string> = {
  CREATE: 'c',
  UPDATE: 'u',
  DELETE: 'd',
  EXTERNAL_TOOL: 'x',
};

/**
 * Assembles plans in code. The upstream planner emits the same shape; the
 * builder exists for embedding callers and tests.
 */
export class PlanBuilder {
  private readonly changes: PlannedChange[] = [];
  private order: ChangeId[] | undefined;
  private nextIdCounter = 0;

  constructor(private readonly options: PlanBuilderOptions = {}) {}

  create(
    resourceType: string,
    resourceRef: string,
    fields: Record<string, unknown>,
    options: ChangeOptions = {},
  ): this {
    this.pushChange('CREATE', resourceType, resourceRef, fields, undefined, options);
    return this;
  }

  update(
    resourceType: string,
    resourceRef: string,
    resourceId: string,
    fields: Record<string, unknown>,
    options: ChangeOptions = {},
  ): this {
    this.pushChange('UPDATE', resourceType, resourceRef, fields, resourceId, options);
    return this;
  }

  delete(
    resourceType: string,
    resourceRef: string,
    resourceId: string,
    fields: Record<string, unknown> = {},
    options: ChangeOptions = {},
  ): this {
    this.pushChange('DELETE', resourceType, resourceRef, fields, resourceId, options);
    return this;
  }

  externalTool(
    resourceType: string,
    resourceRef: string,
    fields: Record<string, unknown>,
    options: ChangeOptions = {},
  ): this {
    this.pushChange('EXTERNAL_TOOL', resourceType, resourceRef, fields, undefined, options);
    return this;
  }

  dependsOn(...changeIds: ChangeId[]): this {
    if (changeIds.length === 0) {
      return this;
    }

    const last = this.changes[this.changes.length - 1];
    if (!last) {
      throw new Error('PlanBuilder.dependsOn() called before any change was added');
    }

    last.dependsOn = Array.from(new Set([...(last.dependsOn ?? []), ...changeIds]));
    return this;
  }

  /**
   * Overrides the execution order. Defaults to insertion order.
   */
  executionOrder(order: ChangeId[]): this {
    this.order = [...order];
    return this;
  }

  getLastChangeId(): ChangeId | undefined {
    return this.changes[this.changes.length - 1]?.id;
  }

  build(): Plan {
    const changes = [...this.changes];
    return {
      metadata: {
        version: this.options.version ?? '1.0',
        generatedAt: (this.options.now?.() ?? new Date()).toISOString(),
        generator: this.options.generator ?? 'resctl',
        mode: this.options.mode ?? 'apply',
      },
      changes,
      executionOrder: this.order ? [...this.order] : changes.map((change) => change.id),
      summary: summarize(changes),
    };
  }

  private pushChange(
    action: ActionType,
    resourceType: string,
    resourceRef: string,
    fields: Record<string, unknown>,
    resourceId: string | undefined,
    options: ChangeOptions,
  ): void {
    const change: PlannedChange = {
      id: options.id ?? this.generateId(action, resourceType, resourceRef),
      action,
      resourceType,
      resourceRef,
      fields: { ...fields },
      namespace: options.namespace ?? 'default',
    };

    if (resourceId !== undefined) {
      change.resourceId = resourceId;
    }
    if (options.references) {
      change.references = { ...options.references };
    }
    if (options.parent) {
      change.parent = { ...options.parent };
    }
    if (options.protection !== undefined) {
      change.protection = options.protection;
    }
    if (options.resourceMonikers) {
      change.resourceMonikers = { ...options.resourceMonikers };
    }
    if (options.configHash) {
      change.configHash = options.configHash;
    }
    if (options.dependsOn) {
      change.dependsOn = [...options.dependsOn];
    }

    this.changes.push(change);
  }

  private generateId(action: ActionType, resourceType: string, resourceRef: string): ChangeId {
    this.nextIdCounter += 1;
    return `${this.nextIdCounter}:${ACTION_PREFIX[action]}:${resourceType}:${resourceRef}`;
  }
}

export function summarize(changes: readonly PlannedChange[]): PlanSummary {
  const summary: PlanSummary = {
    totalChanges: changes.length,
    byAction: {},
    byResource: {},
  };

  for (const change of changes) {
    summary.byAction[change.action] = (summary.byAction[change.action] ?? 0) + 1;
    summary.byResource[change.resourceType] = (summary.byResource[change.resourceType] ?? 0) + 1;
  }

  return summary;
}
