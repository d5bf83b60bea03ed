import { UNKNOWN_ID } from '@resctl/plan-operations';

import { extractResourceName } from '../adapters/fields.js';
import type { CreateDeleteOperations, ExecutionContext } from '../contracts.js';
import { ValidationError, formatApiError } from '../errors.js';
import { assertDeletable, createResource, fetchCurrent } from './base-executor.js';

/**
 * Executor for resource types that are replaced rather than updated. When the
 * adapter can look resources up, deletes get the same protection and
 * ownership checks as the full executor.
 */
export class BaseCreateDeleteExecutor<TCreate> {
  constructor(private readonly ops: CreateDeleteOperations<TCreate>) {}

  get resourceType(): string {
    return this.ops.resourceType;
  }

  create(execContext: ExecutionContext): Promise<string> {
    return createResource(this.ops, execContext);
  }

  async delete(execContext: ExecutionContext): Promise<void> {
    const { change, logger } = execContext;
    const resourceType = this.ops.resourceType;
    const resourceName = extractResourceName(change.fields);
    const id = change.resourceId;
    if (!id) {
      throw new ValidationError(`resource ID required for ${change.action} operation`);
    }

    const canLookup =
      (this.ops.getByName !== undefined && resourceName !== UNKNOWN_ID) || this.ops.getById !== undefined;
    if (canLookup) {
      const resource = await fetchCurrent(this.ops, execContext, resourceName);
      if (!resource) {
        logger.debug(`${resourceType} '${resourceName}' already absent`, { changeId: change.id });
        return;
      }
      assertDeletable(resourceType, resourceName, resource, execContext);
    }

    if (execContext.dryRun) {
      return;
    }

    try {
      await this.ops.delete(id, execContext);
    } catch (error) {
      throw formatApiError(resourceType, resourceName, 'delete', error);
    }
  }
}
