import type { CreatePortalRequest, StateClient, UpdatePortalRequest } from '../client/types.js';
import type { ExecutionContext, ResourceInfo, ResourceOperations } from '../contracts.js';
import type { LabelMap } from '../labels/labels.js';
import { assignDefined, mapOptionalBool, mapOptionalString } from './fields.js';
import { toResourceInfo } from './resource-info.js';
import { createLabels, requestOptions, requireClient, updateLabels } from './support.js';

export class PortalAdapter implements ResourceOperations<CreatePortalRequest, UpdatePortalRequest> {
  readonly resourceType = 'portal';
  readonly requiredFields = ['name'];
  readonly supportsUpdate = true;

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): CreatePortalRequest {
    const request: CreatePortalRequest = {
      name: mapOptionalString(fields, 'name') ?? '',
      labels: createLabels(fields, execContext),
    };
    mapCommonFields(request, fields, execContext);
    return request;
  }

  mapUpdateFields(
    execContext: ExecutionContext,
    fields: Record<string, unknown>,
    currentLabels: LabelMap,
  ): UpdatePortalRequest {
    const request: UpdatePortalRequest = { labels: updateLabels(fields, currentLabels, execContext) };
    assignDefined(request, 'name', mapOptionalString(fields, 'name'));
    mapCommonFields(request, fields, execContext);
    return request;
  }

  async create(request: CreatePortalRequest, execContext: ExecutionContext): Promise<string> {
    const portal = await this.api.createPortal(request, requestOptions(execContext));
    return portal.id;
  }

  async update(id: string, request: UpdatePortalRequest, execContext: ExecutionContext): Promise<string> {
    const portal = await this.api.updatePortal(id, request, requestOptions(execContext));
    return portal.id;
  }

  async delete(id: string, execContext: ExecutionContext): Promise<void> {
    await this.api.deletePortal(id, requestOptions(execContext));
  }

  async getByName(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const portal = await this.api.getPortalByName(name, requestOptions(execContext));
    return portal ? toResourceInfo(portal) : undefined;
  }

  async getById(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const portal = await this.api.getPortalById(id, requestOptions(execContext));
    return portal ? toResourceInfo(portal) : undefined;
  }
}

function mapCommonFields(
  request: CreatePortalRequest | UpdatePortalRequest,
  fields: Record<string, unknown>,
  execContext: ExecutionContext,
): void {
  assignDefined(request, 'displayName', mapOptionalString(fields, 'display_name'));
  assignDefined(request, 'description', mapOptionalString(fields, 'description'));
  assignDefined(request, 'authenticationEnabled', mapOptionalBool(fields, 'authentication_enabled'));
  assignDefined(request, 'rbacEnabled', mapOptionalBool(fields, 'rbac_enabled'));
  assignDefined(request, 'autoApproveDevelopers', mapOptionalBool(fields, 'auto_approve_developers'));
  assignDefined(request, 'autoApproveApplications', mapOptionalBool(fields, 'auto_approve_applications'));
  assignDefined(request, 'defaultApiVisibility', mapOptionalString(fields, 'default_api_visibility'));
  assignDefined(request, 'defaultPageVisibility', mapOptionalString(fields, 'default_page_visibility'));
  assignDefined(
    request,
    'defaultApplicationAuthStrategyId',
    execContext.references.default_application_auth_strategy_id,
  );
}
