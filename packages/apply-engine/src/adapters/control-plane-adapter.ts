import type { CreateControlPlaneRequest, StateClient, UpdateControlPlaneRequest } from '../client/types.js';
import type { ExecutionContext, ResourceInfo, ResourceOperations } from '../contracts.js';
import { ValidationError } from '../errors.js';
import type { LabelMap } from '../labels/labels.js';
import { assignDefined, isRecord, mapOptionalBool, mapOptionalString } from './fields.js';
import { toResourceInfo } from './resource-info.js';
import { createLabels, requestOptions, requireClient, updateLabels } from './support.js';

export class ControlPlaneAdapter
  implements ResourceOperations<CreateControlPlaneRequest, UpdateControlPlaneRequest>
{
  readonly resourceType = 'control_plane';
  readonly requiredFields = ['name'];
  readonly supportsUpdate = true;

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): CreateControlPlaneRequest {
    const request: CreateControlPlaneRequest = {
      name: mapOptionalString(fields, 'name') ?? '',
      labels: createLabels(fields, execContext),
    };
    assignDefined(request, 'description', mapOptionalString(fields, 'description'));
    assignDefined(request, 'clusterType', mapOptionalString(fields, 'cluster_type'));
    assignDefined(request, 'authType', mapOptionalString(fields, 'auth_type'));
    assignDefined(request, 'cloudGateway', mapOptionalBool(fields, 'cloud_gateway'));
    assignDefined(request, 'proxyUrls', mapProxyUrls(fields.proxy_urls));
    return request;
  }

  mapUpdateFields(
    execContext: ExecutionContext,
    fields: Record<string, unknown>,
    currentLabels: LabelMap,
  ): UpdateControlPlaneRequest {
    const request: UpdateControlPlaneRequest = { labels: updateLabels(fields, currentLabels, execContext) };
    assignDefined(request, 'name', mapOptionalString(fields, 'name'));
    assignDefined(request, 'description', mapOptionalString(fields, 'description'));
    assignDefined(request, 'authType', mapOptionalString(fields, 'auth_type'));
    assignDefined(request, 'proxyUrls', mapProxyUrls(fields.proxy_urls));
    return request;
  }

  async create(request: CreateControlPlaneRequest, execContext: ExecutionContext): Promise<string> {
    return (await this.api.createControlPlane(request, requestOptions(execContext))).id;
  }

  async update(id: string, request: UpdateControlPlaneRequest, execContext: ExecutionContext): Promise<string> {
    return (await this.api.updateControlPlane(id, request, requestOptions(execContext))).id;
  }

  async delete(id: string, execContext: ExecutionContext): Promise<void> {
    await this.api.deleteControlPlane(id, requestOptions(execContext));
  }

  async getByName(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const controlPlane = await this.api.getControlPlaneByName(name, requestOptions(execContext));
    return controlPlane ? toResourceInfo(controlPlane) : undefined;
  }

  async getById(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const controlPlane = await this.api.getControlPlaneById(id, requestOptions(execContext));
    return controlPlane ? toResourceInfo(controlPlane) : undefined;
  }
}

/**
 * Proxy URLs arrive either as strings or as `{ host, port, protocol }`
 * objects.
 */
export function mapProxyUrls(value: unknown): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ValidationError('proxy_urls must be a list');
  }
  return value.map((entry, index) => {
    if (typeof entry === 'string') {
      return entry;
    }
    if (isRecord(entry) && typeof entry.host === 'string' && entry.host !== '') {
      const protocol = typeof entry.protocol === 'string' && entry.protocol !== '' ? entry.protocol : 'https';
      const port = typeof entry.port === 'number' || typeof entry.port === 'string' ? `:${entry.port}` : '';
      return `${protocol}://${entry.host}${port}`;
    }
    throw new ValidationError(`proxy_urls[${index}] must be a URL or an object with a host`);
  });
}
