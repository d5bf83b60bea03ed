import type { CreateApiRequest, StateClient, UpdateApiRequest } from '../client/types.js';
import type { ExecutionContext, ResourceInfo, ResourceOperations } from '../contracts.js';
import type { LabelMap } from '../labels/labels.js';
import { assignDefined, mapOptionalString } from './fields.js';
import { toResourceInfo } from './resource-info.js';
import { createLabels, requestOptions, requireClient, updateLabels } from './support.js';

export class ApiAdapter implements ResourceOperations<CreateApiRequest, UpdateApiRequest> {
  readonly resourceType = 'api';
  readonly requiredFields = ['name'];
  readonly supportsUpdate = true;

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): CreateApiRequest {
    const request: CreateApiRequest = {
      name: mapOptionalString(fields, 'name') ?? '',
      labels: createLabels(fields, execContext),
    };
    assignDefined(request, 'description', mapOptionalString(fields, 'description'));
    assignDefined(request, 'version', mapOptionalString(fields, 'version'));
    assignDefined(request, 'slug', mapOptionalString(fields, 'slug'));
    return request;
  }

  mapUpdateFields(
    execContext: ExecutionContext,
    fields: Record<string, unknown>,
    currentLabels: LabelMap,
  ): UpdateApiRequest {
    const request: UpdateApiRequest = { labels: updateLabels(fields, currentLabels, execContext) };
    assignDefined(request, 'name', mapOptionalString(fields, 'name'));
    assignDefined(request, 'description', mapOptionalString(fields, 'description'));
    assignDefined(request, 'version', mapOptionalString(fields, 'version'));
    assignDefined(request, 'slug', mapOptionalString(fields, 'slug'));
    return request;
  }

  async create(request: CreateApiRequest, execContext: ExecutionContext): Promise<string> {
    return (await this.api.createApi(request, requestOptions(execContext))).id;
  }

  async update(id: string, request: UpdateApiRequest, execContext: ExecutionContext): Promise<string> {
    return (await this.api.updateApi(id, request, requestOptions(execContext))).id;
  }

  async delete(id: string, execContext: ExecutionContext): Promise<void> {
    await this.api.deleteApi(id, requestOptions(execContext));
  }

  async getByName(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const api = await this.api.getApiByName(name, requestOptions(execContext));
    return api ? toResourceInfo(api) : undefined;
  }

  async getById(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const api = await this.api.getApiById(id, requestOptions(execContext));
    return api ? toResourceInfo(api) : undefined;
  }
}
