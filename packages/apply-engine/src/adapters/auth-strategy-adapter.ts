import type {
  AuthStrategyType,
  CreateAuthStrategyRequest,
  StateClient,
  UpdateAuthStrategyRequest,
} from '../client/types.js';
import type { ExecutionContext, ResourceInfo, ResourceOperations } from '../contracts.js';
import { ValidationError } from '../errors.js';
import type { LabelMap } from '../labels/labels.js';
import { assignDefined, mapOptionalRecord, mapOptionalString } from './fields.js';
import { toResourceInfo } from './resource-info.js';
import { createLabels, requestOptions, requireClient, updateLabels } from './support.js';

const STRATEGY_TYPES: readonly AuthStrategyType[] = ['key_auth', 'openid_connect'];

function isStrategyType(value: unknown): value is AuthStrategyType {
  return STRATEGY_TYPES.some((type) => type === value);
}

export class AuthStrategyAdapter
  implements ResourceOperations<CreateAuthStrategyRequest, UpdateAuthStrategyRequest>
{
  readonly resourceType = 'application_auth_strategy';
  readonly requiredFields = ['name', 'strategy_type'];
  readonly supportsUpdate = true;

  constructor(private readonly client: StateClient | undefined) {}

  private get api(): StateClient {
    return requireClient(this.client, this.resourceType);
  }

  mapCreateFields(execContext: ExecutionContext, fields: Record<string, unknown>): CreateAuthStrategyRequest {
    const strategyType = fields.strategy_type;
    if (!isStrategyType(strategyType)) {
      throw new ValidationError(`unsupported strategy_type: ${String(strategyType)}`);
    }
    const request: CreateAuthStrategyRequest = {
      name: mapOptionalString(fields, 'name') ?? '',
      strategyType,
      configs: mapOptionalRecord(fields, 'configs') ?? {},
      labels: createLabels(fields, execContext),
    };
    assignDefined(request, 'displayName', mapOptionalString(fields, 'display_name'));
    return request;
  }

  mapUpdateFields(
    execContext: ExecutionContext,
    fields: Record<string, unknown>,
    currentLabels: LabelMap,
  ): UpdateAuthStrategyRequest {
    const request: UpdateAuthStrategyRequest = { labels: updateLabels(fields, currentLabels, execContext) };
    assignDefined(request, 'displayName', mapOptionalString(fields, 'display_name'));
    assignDefined(request, 'configs', mapOptionalRecord(fields, 'configs'));
    return request;
  }

  async create(request: CreateAuthStrategyRequest, execContext: ExecutionContext): Promise<string> {
    return (await this.api.createAuthStrategy(request, requestOptions(execContext))).id;
  }

  async update(id: string, request: UpdateAuthStrategyRequest, execContext: ExecutionContext): Promise<string> {
    return (await this.api.updateAuthStrategy(id, request, requestOptions(execContext))).id;
  }

  async delete(id: string, execContext: ExecutionContext): Promise<void> {
    await this.api.deleteAuthStrategy(id, requestOptions(execContext));
  }

  async getByName(name: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const strategy = await this.api.getAuthStrategyByName(name, requestOptions(execContext));
    return strategy ? toResourceInfo(strategy) : undefined;
  }

  async getById(id: string, execContext: ExecutionContext): Promise<ResourceInfo | undefined> {
    const strategy = await this.api.getAuthStrategyById(id, requestOptions(execContext));
    return strategy ? toResourceInfo(strategy) : undefined;
  }
}
