import type { ExecutionContext, SingletonOperations } from '../contracts.js';
import { ValidationError, formatApiError } from '../errors.js';

export class BaseSingletonExecutor<TUpdate> {
  constructor(private readonly ops: SingletonOperations<TUpdate>) {}

  get resourceType(): string {
    return this.ops.resourceType;
  }

  /** Returns the parent id, which doubles as the singleton's identity. */
  async update(execContext: ExecutionContext): Promise<string> {
    const resourceType = this.ops.resourceType;
    const parentId = execContext.parentId;
    if (!parentId) {
      throw new ValidationError(`${resourceType} requires a parent resource id`);
    }
    execContext.logger.debug(`Updating ${resourceType}`, { parentId, changeId: execContext.change.id });

    let request: TUpdate;
    try {
      request = this.ops.mapUpdateFields(execContext, execContext.change.fields);
    } catch (error) {
      throw formatApiError(resourceType, parentId, 'update', error);
    }

    if (execContext.dryRun) {
      return parentId;
    }

    try {
      await this.ops.update(parentId, request, execContext);
    } catch (error) {
      throw formatApiError(resourceType, parentId, 'update', error);
    }
    return parentId;
  }
}
