import { isRefPlaceholder } from '@resctl/plan-operations';

import type { CreateApiImplementationRequest, StateClient } from '../client/types.js';
import type { CreateDeleteOperations, ExecutionContext } from '../contracts.js';
import { ValidationError } from '../errors.js';
import { isRecord } from './fields.js';
import { requestOptions, requireClient, requireReference } from './support.js';

export class ApiImplementationAdapter implements CreateDeleteOperations<CreateApiImplementationRequest> {
  readonly resourceType = 'api_implementation';
  readonly requiredFields = ['service'];

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): CreateApiImplementationRequest {
    const service = fields.service;
    if (!isRecord(service)) {
      throw new ValidationError('service must be an object with id and control_plane_id');
    }
    const serviceId = requireServiceString(service, 'id');
    const controlPlaneId =
      execContext.references.control_plane_id ?? requireServiceString(service, 'control_plane_id');
    return { service: { id: serviceId, controlPlaneId } };
  }

  async create(request: CreateApiImplementationRequest, execContext: ExecutionContext): Promise<string> {
    const apiId = requireReference(execContext, 'api_id', this.resourceType);
    return (await this.api.createApiImplementation(apiId, request, requestOptions(execContext))).id;
  }

  async delete(id: string, execContext: ExecutionContext): Promise<void> {
    const apiId = requireReference(execContext, 'api_id', this.resourceType);
    await this.api.deleteApiImplementation(apiId, id, requestOptions(execContext));
  }
}

function requireServiceString(service: Record<string, unknown>, key: string): string {
  const value = service[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`service.${key} is required`);
  }
  if (isRefPlaceholder(value)) {
    throw new ValidationError(`service.${key} is an unresolved reference: ${value}`);
  }
  return value;
}
