import type { CreateApiVersionRequest, StateClient } from '../client/types.js';
import type { CreateDeleteOperations, ExecutionContext } from '../contracts.js';
import { assignDefined, isRecord, mapOptionalString } from './fields.js';
import { requestOptions, requireClient, requireReference } from './support.js';

export class ApiVersionAdapter implements CreateDeleteOperations<CreateApiVersionRequest> {
  readonly resourceType = 'api_version';
  readonly requiredFields = ['version'];

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(_execContext: ExecutionContext, fields: Record<string, unknown>): CreateApiVersionRequest {
    const request: CreateApiVersionRequest = { version: mapOptionalString(fields, 'version') ?? '' };
    const spec = fields.spec;
    if (typeof spec === 'string') {
      request.specContent = spec;
    } else if (isRecord(spec)) {
      assignDefined(request, 'specContent', mapOptionalString(spec, 'content'));
    }
    return request;
  }

  async create(request: CreateApiVersionRequest, execContext: ExecutionContext): Promise<string> {
    const apiId = requireReference(execContext, 'api_id', this.resourceType);
    return (await this.api.createApiVersion(apiId, request, requestOptions(execContext))).id;
  }

  async delete(id: string, execContext: ExecutionContext): Promise<void> {
    const apiId = requireReference(execContext, 'api_id', this.resourceType);
    await this.api.deleteApiVersion(apiId, id, requestOptions(execContext));
  }
}
