import type { ActionType, Plan, PlanMode, PlannedChange } from '@resctl/plan-operations';

import type { Logger } from './logging/logger.js';
import type { ReferenceResolver } from './resolver/reference-resolver.js';

export interface HandlerContext {
  /** The plan being executed; a per-run copy in dry-run. */
  plan: Plan;
  dryRun: boolean;
  mode: PlanMode;
  signal?: AbortSignal;
  logger: Logger;
  resolver: ReferenceResolver;
}

export interface HandlerResult {
  resourceId?: string;
}

export type ChangeHandler = (change: PlannedChange, context: HandlerContext) => Promise<HandlerResult>;

export interface ResourceHandlers {
  create?: ChangeHandler;
  update?: ChangeHandler;
  delete?: ChangeHandler;
  externalTool?: ChangeHandler;
  /** Singletons have no id of their own and are addressed through their parent. */
  singleton?: boolean;
}

const ACTION_SLOTS: Record<ActionType, keyof Omit<ResourceHandlers, 'singleton'>> = {
  CREATE: 'create',
  UPDATE: 'update',
  DELETE: 'delete',
  EXTERNAL_TOOL: 'externalTool',
};

export class AdapterRegistry {
  private readonly handlers = new Map<string, ResourceHandlers>();

  register(resourceType: string, handlers: ResourceHandlers): this {
    this.handlers.set(resourceType, { ...this.handlers.get(resourceType), ...handlers });
    return this;
  }

  get(resourceType: string): ResourceHandlers | undefined {
    return this.handlers.get(resourceType);
  }

  resolve(resourceType: string, action: ActionType): ChangeHandler | undefined {
    return this.handlers.get(resourceType)?.[ACTION_SLOTS[action]];
  }

  isSingleton(resourceType: string): boolean {
    return this.handlers.get(resourceType)?.singleton === true;
  }

  resourceTypes(): string[] {
    return [...this.handlers.keys()];
  }
}

export function createAdapterRegistry(): AdapterRegistry {
  return new AdapterRegistry();
}
