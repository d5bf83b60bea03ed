import type { CreateApiPublicationRequest, StateClient } from '../client/types.js';
import type { CreateDeleteOperations, ExecutionContext } from '../contracts.js';
import { ValidationError } from '../errors.js';
import { assignDefined, mapOptionalBool, mapOptionalString, mapOptionalStringArray } from './fields.js';
import { requestOptions, requireClient, requireReference } from './support.js';

/**
 * Publications are identified by the portal they publish to; the api id comes
 * from the parent.
 */
export class ApiPublicationAdapter implements CreateDeleteOperations<CreateApiPublicationRequest> {
  readonly resourceType = 'api_publication';
  readonly requiredFields = ['portal_id'];

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(_execContext: ExecutionContext, fields: Record<string, unknown>): CreateApiPublicationRequest {
    const request: CreateApiPublicationRequest = {};
    const visibility = mapOptionalString(fields, 'visibility');
    if (visibility !== undefined) {
      if (visibility !== 'public' && visibility !== 'private') {
        throw new ValidationError(`invalid visibility '${visibility}': expected public or private`);
      }
      request.visibility = visibility;
    }
    assignDefined(request, 'authStrategyIds', mapOptionalStringArray(fields, 'auth_strategy_ids'));
    assignDefined(request, 'autoApproveRegistrations', mapOptionalBool(fields, 'auto_approve_registrations'));
    return request;
  }

  async create(request: CreateApiPublicationRequest, execContext: ExecutionContext): Promise<string> {
    const apiId = requireReference(execContext, 'api_id', this.resourceType);
    const portalId = requireReference(execContext, 'portal_id', this.resourceType);
    const publication = await this.api.createApiPublication(apiId, portalId, request, requestOptions(execContext));
    return publication.portalId;
  }

  async delete(portalId: string, execContext: ExecutionContext): Promise<void> {
    const apiId = requireReference(execContext, 'api_id', this.resourceType);
    await this.api.deleteApiPublication(apiId, portalId, requestOptions(execContext));
  }
}
