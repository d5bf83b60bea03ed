import { UNKNOWN_ID } from '@resctl/plan-operations';

import { extractResourceName, validateRequiredFields } from '../adapters/fields.js';
import type { ExecutionContext, ResourceInfo, ResourceOperations } from '../contracts.js';
import {
  ApplyError,
  ProtectionViolationError,
  RemoteApiError,
  ValidationError,
  formatApiError,
  toError,
} from '../errors.js';
import { getUserLabels, isManagedResource } from '../labels/labels.js';
import { isProtected, isProtectionChange, validateResourceProtection } from '../labels/protection.js';

type CreateSide<TCreate> = Pick<
  ResourceOperations<TCreate, unknown>,
  'resourceType' | 'requiredFields' | 'mapCreateFields' | 'create'
>;

type LookupSide = {
  readonly resourceType: string;
  getByName?(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined>;
  getById?(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined>;
};

export function dryRunId(resourceType: string): string {
  return `dry-run-${resourceType}-id`;
}

export async function createResource<TCreate>(
  ops: CreateSide<TCreate>,
  execContext: ExecutionContext,
): Promise<string> {
  const { change, logger } = execContext;
  const resourceType = ops.resourceType;
  const resourceName = extractResourceName(change.fields);
  logger.debug(`Creating ${resourceType}`, { name: resourceName, changeId: change.id });

  validateRequiredFields(resourceType, change.fields, ops.requiredFields);

  let request: TCreate;
  try {
    request = ops.mapCreateFields(execContext, change.fields);
  } catch (error) {
    throw formatApiError(resourceType, resourceName, 'create', error);
  }

  if (execContext.dryRun) {
    return dryRunId(resourceType);
  }

  try {
    return await ops.create(request, execContext);
  } catch (error) {
    throw formatApiError(resourceType, resourceName, 'create', error);
  }
}

/**
 * Re-reads the target resource at execution time. Resources without a name
 * in their fields are looked up by id when the adapter can do so.
 */
export async function fetchCurrent(
  ops: LookupSide,
  execContext: ExecutionContext,
  resourceName: string,
): Promise<ResourceInfo | undefined> {
  const { change } = execContext;
  try {
    if (resourceName === UNKNOWN_ID) {
      if (ops.getById && change.resourceId) {
        return await ops.getById(change.resourceId, execContext);
      }
      throw new ValidationError(`cannot look up ${ops.resourceType} without a name`);
    }
    if (ops.getByName) {
      return await ops.getByName(resourceName, execContext);
    }
    if (ops.getById && change.resourceId) {
      return await ops.getById(change.resourceId, execContext);
    }
    throw new ValidationError(`${ops.resourceType} does not support lookups`);
  } catch (error) {
    if (error instanceof ApplyError) {
      throw error;
    }
    const err = toError(error);
    throw new RemoteApiError(`failed to fetch ${ops.resourceType} for protection check: ${err.message}`, {
      cause: err,
    });
  }
}

/** Protection and ownership checks shared by every delete path. */
export function assertDeletable(
  resourceType: string,
  resourceName: string,
  resource: ResourceInfo,
  execContext: ExecutionContext,
): void {
  validateResourceProtection(
    resourceType,
    resourceName,
    isProtected(resource.normalizedLabels),
    execContext.change,
    isProtectionChange(execContext.protection),
  );
  if (!isManagedResource(resource.normalizedLabels)) {
    throw new ProtectionViolationError(`cannot delete ${resourceType} '${resourceName}': not a managed resource`, {
      context: { resourceType, resourceName },
    });
  }
}

export class BaseExecutor<TCreate, TUpdate> {
  constructor(private readonly ops: ResourceOperations<TCreate, TUpdate>) {}

  get resourceType(): string {
    return this.ops.resourceType;
  }

  create(execContext: ExecutionContext): Promise<string> {
    return createResource(this.ops, execContext);
  }

  async update(execContext: ExecutionContext): Promise<string> {
    const { change, logger } = execContext;
    const resourceType = this.ops.resourceType;
    if (!this.ops.supportsUpdate) {
      throw new ValidationError(`${resourceType} does not support update operations`);
    }

    const resourceName = extractResourceName(change.fields);
    logger.debug(`Updating ${resourceType}`, { name: resourceName, changeId: change.id });

    const resource = await fetchCurrent(this.ops, execContext, resourceName);
    if (!resource) {
      throw new ValidationError(`${resourceType} '${resourceName}' no longer exists`);
    }

    validateResourceProtection(
      resourceType,
      resourceName,
      isProtected(resource.normalizedLabels),
      change,
      isProtectionChange(execContext.protection),
    );

    const currentLabels = getUserLabels(resource.labels);

    let request: TUpdate;
    try {
      request = this.ops.mapUpdateFields(execContext, change.fields, currentLabels);
    } catch (error) {
      throw formatApiError(resourceType, resourceName, 'update', error);
    }

    const id = change.resourceId ?? resource.id;
    if (execContext.dryRun) {
      return id;
    }

    try {
      return await this.ops.update(id, request, execContext);
    } catch (error) {
      throw formatApiError(resourceType, resourceName, 'update', error);
    }
  }

  async delete(execContext: ExecutionContext): Promise<void> {
    const { change, logger } = execContext;
    const resourceType = this.ops.resourceType;
    const resourceName = extractResourceName(change.fields);

    const resource = await fetchCurrent(this.ops, execContext, resourceName);
    if (!resource) {
      logger.debug(`${resourceType} '${resourceName}' already absent`, { changeId: change.id });
      return;
    }

    assertDeletable(resourceType, resourceName, resource, execContext);

    if (execContext.dryRun) {
      return;
    }

    try {
      await this.ops.delete(change.resourceId ?? resource.id, execContext);
    } catch (error) {
      throw formatApiError(resourceType, resourceName, 'delete', error);
    }
  }
}
