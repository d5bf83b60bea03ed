import type { PlannedChange } from '@resctl/plan-operations';

import type { ExecutionContext } from '../contracts.js';
import type { ChangeHandler, HandlerContext, ResourceHandlers } from '../operation-registry.js';

export interface ReferenceBinding {
  /** Key under which the id appears in `ExecutionContext.references`. */
  key: string;
  resourceType: string;
  /** Entry in `change.references`; defaults to `key`. */
  referenceKey?: string;
  /** Field holding a literal id or placeholder; defaults to `key`. */
  field?: string;
  /** The change's parent pointer refers to this resource. */
  parent?: boolean;
  optional?: boolean;
}

export interface BindableExecutor {
  create?(execContext: ExecutionContext): Promise<string>;
  update?(execContext: ExecutionContext): Promise<string>;
  delete?(execContext: ExecutionContext): Promise<void>;
}

export interface BindOptions {
  references?: readonly ReferenceBinding[];
  singleton?: boolean;
}

export async function buildExecutionContext(
  change: PlannedChange,
  context: HandlerContext,
  bindings: readonly ReferenceBinding[] = [],
): Promise<ExecutionContext> {
  const references: Record<string, string> = {};
  let parentId: string | undefined;

  for (const binding of bindings) {
    const request = {
      resourceType: binding.resourceType,
      referenceKey: binding.referenceKey ?? binding.key,
      field: binding.field ?? binding.key,
      fromParent: binding.parent === true,
    };
    const id = binding.optional
      ? await context.resolver.tryResolve(change, request, context.signal)
      : await context.resolver.resolve(change, request, context.signal);
    if (id === undefined) {
      continue;
    }
    references[binding.key] = id;
    if (binding.parent) {
      parentId = id;
    }
  }

  const execContext: ExecutionContext = {
    change,
    namespace: change.namespace,
    references,
    dryRun: context.dryRun,
    logger: context.logger,
  };
  if (change.protection !== undefined) {
    execContext.protection = change.protection;
  }
  if (parentId !== undefined) {
    execContext.parentId = parentId;
  }
  if (context.signal) {
    execContext.signal = context.signal;
  }
  return execContext;
}

/**
 * Adapts a base executor to registry handlers, resolving the declared
 * references before each call.
 */
export function bindExecutor(executor: BindableExecutor, options: BindOptions = {}): ResourceHandlers {
  const bindings = options.references ?? [];
  const handlers: ResourceHandlers = {};

  const { create, update } = executor;
  if (create) {
    handlers.create = withContext(bindings, async (execContext) => ({
      resourceId: await create.call(executor, execContext),
    }));
  }
  if (update) {
    handlers.update = withContext(bindings, async (execContext) => ({
      resourceId: await update.call(executor, execContext),
    }));
  }
  const remove = executor.delete;
  if (remove) {
    handlers.delete = withContext(bindings, async (execContext) => {
      await remove.call(executor, execContext);
      return {};
    });
  }
  if (options.singleton) {
    handlers.singleton = true;
  }
  return handlers;
}

function withContext(
  bindings: readonly ReferenceBinding[],
  run: (execContext: ExecutionContext) => Promise<{ resourceId?: string }>,
): ChangeHandler {
  return async (change, context) => run(await buildExecutionContext(change, context, bindings));
}
