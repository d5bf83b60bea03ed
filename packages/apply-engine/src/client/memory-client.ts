import { v4 as uuidv4 } from 'uuid';

import { LAST_UPDATED_KEY, MANAGED_KEY, TRUE_VALUE, formatLastUpdated } from '../labels/labels.js';
import type { LabelMap, LabelUpdate } from '../labels/labels.js';
import type {
  Api,
  ApiImplementation,
  ApiLabels,
  ApiPublication,
  ApiVersion,
  AuthStrategy,
  ControlPlane,
  CreateApiImplementationRequest,
  CreateApiPublicationRequest,
  CreateApiRequest,
  CreateApiVersionRequest,
  CreateAuthStrategyRequest,
  CreateControlPlaneRequest,
  CreatePortalRequest,
  GatewayService,
  Portal,
  PortalCustomization,
  RequestOptions,
  StateClient,
  UpdateApiRequest,
  UpdateAuthStrategyRequest,
  UpdateControlPlaneRequest,
  UpdatePortalCustomizationRequest,
  UpdatePortalRequest,
} from './types.js';

function clone<T>(value: T): T {
  return structuredClone(value);
}

interface Named {
  id: string;
  name: string;
  labels: ApiLabels;
}

type SeedInput<T extends Named> = Omit<T, 'id' | 'labels'> & { id?: string; labels?: ApiLabels };

export interface MemoryStateClientOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * In-process state client. Every write stamps the managed and last-updated
 * labels the way the remote API client does. `calls` records each method
 * invoked, in order.
 */
export class MemoryStateClient implements StateClient {
  readonly calls: string[] = [];

  private readonly portals = new Map<string, Portal>();
  private readonly controlPlanes = new Map<string, ControlPlane>();
  private readonly apis = new Map<string, Api>();
  private readonly authStrategies = new Map<string, AuthStrategy>();
  private readonly apiVersions = new Map<string, ApiVersion>();
  private readonly apiPublications = new Map<string, ApiPublication>();
  private readonly apiImplementations = new Map<string, ApiImplementation>();
  private readonly customizations = new Map<string, PortalCustomization>();
  private readonly gatewayServices = new Map<string, GatewayService>();

  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryStateClientOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => uuidv4());
  }

  /** Calls that would change remote state. */
  mutations(): string[] {
    return this.calls.filter((call) => /^(create|update|delete)/.test(call));
  }

  seedPortal(portal: SeedInput<Portal>): Portal {
    const { id, labels, ...rest } = portal;
    return this.seed(this.portals, { ...rest, id: id ?? this.generateId(), labels: { ...labels } });
  }

  seedControlPlane(controlPlane: SeedInput<ControlPlane>): ControlPlane {
    const { id, labels, ...rest } = controlPlane;
    return this.seed(this.controlPlanes, { ...rest, id: id ?? this.generateId(), labels: { ...labels } });
  }

  seedApi(api: SeedInput<Api>): Api {
    const { id, labels, ...rest } = api;
    return this.seed(this.apis, { ...rest, id: id ?? this.generateId(), labels: { ...labels } });
  }

  seedAuthStrategy(strategy: SeedInput<AuthStrategy>): AuthStrategy {
    const { id, labels, ...rest } = strategy;
    return this.seed(this.authStrategies, { ...rest, id: id ?? this.generateId(), labels: { ...labels } });
  }

  seedGatewayService(service: Omit<GatewayService, 'id'> & { id?: string }): GatewayService {
    const stored: GatewayService = { ...service, id: service.id ?? this.generateId() };
    this.gatewayServices.set(stored.id, stored);
    return clone(stored);
  }

  seedPortalCustomization(customization: PortalCustomization): void {
    this.customizations.set(customization.portalId, clone(customization));
  }

  getPortalCustomizationSnapshot(portalId: string): PortalCustomization | undefined {
    const stored = this.customizations.get(portalId);
    return stored ? clone(stored) : undefined;
  }

  async getPortalByName(name: string, options?: RequestOptions): Promise<Portal | undefined> {
    return this.findByName('getPortalByName', this.portals, name, options);
  }

  async getPortalById(id: string, options?: RequestOptions): Promise<Portal | undefined> {
    return this.findById('getPortalById', this.portals, id, options);
  }

  async createPortal(request: CreatePortalRequest, options?: RequestOptions): Promise<Portal> {
    return this.insert('createPortal', 'portal', this.portals, request, options, (id, labels) => ({
      ...clone(request),
      id,
      labels,
    }));
  }

  async updatePortal(id: string, request: UpdatePortalRequest, options?: RequestOptions): Promise<Portal> {
    const { labels, ...rest } = request;
    return this.patch('updatePortal', 'portal', this.portals, id, labels, options, (current) => ({
      ...current,
      ...clone(rest),
    }));
  }

  async deletePortal(id: string, options?: RequestOptions): Promise<void> {
    this.remove('deletePortal', 'portal', this.portals, id, options);
    this.customizations.delete(id);
  }

  async getControlPlaneByName(name: string, options?: RequestOptions): Promise<ControlPlane | undefined> {
    return this.findByName('getControlPlaneByName', this.controlPlanes, name, options);
  }

  async getControlPlaneById(id: string, options?: RequestOptions): Promise<ControlPlane | undefined> {
    return this.findById('getControlPlaneById', this.controlPlanes, id, options);
  }

  async createControlPlane(request: CreateControlPlaneRequest, options?: RequestOptions): Promise<ControlPlane> {
    return this.insert('createControlPlane', 'control_plane', this.controlPlanes, request, options, (id, labels) => ({
      ...clone(request),
      id,
      labels,
    }));
  }

  async updateControlPlane(
    id: string,
    request: UpdateControlPlaneRequest,
    options?: RequestOptions,
  ): Promise<ControlPlane> {
    const { labels, ...rest } = request;
    return this.patch('updateControlPlane', 'control_plane', this.controlPlanes, id, labels, options, (current) => ({
      ...current,
      ...clone(rest),
    }));
  }

  async deleteControlPlane(id: string, options?: RequestOptions): Promise<void> {
    this.remove('deleteControlPlane', 'control_plane', this.controlPlanes, id, options);
  }

  async getApiByName(name: string, options?: RequestOptions): Promise<Api | undefined> {
    return this.findByName('getApiByName', this.apis, name, options);
  }

  async getApiById(id: string, options?: RequestOptions): Promise<Api | undefined> {
    return this.findById('getApiById', this.apis, id, options);
  }

  async createApi(request: CreateApiRequest, options?: RequestOptions): Promise<Api> {
    return this.insert('createApi', 'api', this.apis, request, options, (id, labels) => ({
      ...clone(request),
      id,
      labels,
    }));
  }

  async updateApi(id: string, request: UpdateApiRequest, options?: RequestOptions): Promise<Api> {
    const { labels, ...rest } = request;
    return this.patch('updateApi', 'api', this.apis, id, labels, options, (current) => ({
      ...current,
      ...clone(rest),
    }));
  }

  async deleteApi(id: string, options?: RequestOptions): Promise<void> {
    this.remove('deleteApi', 'api', this.apis, id, options);
  }

  async listApiVersions(apiId: string, options?: RequestOptions): Promise<ApiVersion[]> {
    this.enter('listApiVersions', options);
    return [...this.apiVersions.values()].filter((version) => version.apiId === apiId).map(clone);
  }

  async createApiVersion(
    apiId: string,
    request: CreateApiVersionRequest,
    options?: RequestOptions,
  ): Promise<ApiVersion> {
    this.enter('createApiVersion', options);
    this.requireApi(apiId);
    const duplicate = [...this.apiVersions.values()].some(
      (version) => version.apiId === apiId && version.version === request.version,
    );
    if (duplicate) {
      throw new Error(`api_version '${request.version}' already exists for api '${apiId}'`);
    }
    const stored: ApiVersion = { ...clone(request), id: this.generateId(), apiId };
    this.apiVersions.set(stored.id, stored);
    return clone(stored);
  }

  async deleteApiVersion(apiId: string, versionId: string, options?: RequestOptions): Promise<void> {
    this.enter('deleteApiVersion', options);
    const stored = this.apiVersions.get(versionId);
    if (!stored || stored.apiId !== apiId) {
      throw new Error(`api_version '${versionId}' not found`);
    }
    this.apiVersions.delete(versionId);
  }

  async listApiPublications(apiId: string, options?: RequestOptions): Promise<ApiPublication[]> {
    this.enter('listApiPublications', options);
    return [...this.apiPublications.values()].filter((publication) => publication.apiId === apiId).map(clone);
  }

  async createApiPublication(
    apiId: string,
    portalId: string,
    request: CreateApiPublicationRequest,
    options?: RequestOptions,
  ): Promise<ApiPublication> {
    this.enter('createApiPublication', options);
    this.requireApi(apiId);
    if (!this.portals.has(portalId)) {
      throw new Error(`portal '${portalId}' not found`);
    }
    const stored: ApiPublication = { ...clone(request), apiId, portalId };
    this.apiPublications.set(`${apiId}/${portalId}`, stored);
    return clone(stored);
  }

  async deleteApiPublication(apiId: string, portalId: string, options?: RequestOptions): Promise<void> {
    this.enter('deleteApiPublication', options);
    if (!this.apiPublications.delete(`${apiId}/${portalId}`)) {
      throw new Error(`api_publication for api '${apiId}' in portal '${portalId}' not found`);
    }
  }

  async listApiImplementations(apiId: string, options?: RequestOptions): Promise<ApiImplementation[]> {
    this.enter('listApiImplementations', options);
    return [...this.apiImplementations.values()]
      .filter((implementation) => implementation.apiId === apiId)
      .map(clone);
  }

  async createApiImplementation(
    apiId: string,
    request: CreateApiImplementationRequest,
    options?: RequestOptions,
  ): Promise<ApiImplementation> {
    this.enter('createApiImplementation', options);
    this.requireApi(apiId);
    const stored: ApiImplementation = { ...clone(request), id: this.generateId(), apiId };
    this.apiImplementations.set(stored.id, stored);
    return clone(stored);
  }

  async deleteApiImplementation(apiId: string, implementationId: string, options?: RequestOptions): Promise<void> {
    this.enter('deleteApiImplementation', options);
    const stored = this.apiImplementations.get(implementationId);
    if (!stored || stored.apiId !== apiId) {
      throw new Error(`api_implementation '${implementationId}' not found`);
    }
    this.apiImplementations.delete(implementationId);
  }

  async getAuthStrategyByName(name: string, options?: RequestOptions): Promise<AuthStrategy | undefined> {
    return this.findByName('getAuthStrategyByName', this.authStrategies, name, options);
  }

  async getAuthStrategyById(id: string, options?: RequestOptions): Promise<AuthStrategy | undefined> {
    return this.findById('getAuthStrategyById', this.authStrategies, id, options);
  }

  async createAuthStrategy(request: CreateAuthStrategyRequest, options?: RequestOptions): Promise<AuthStrategy> {
    return this.insert('createAuthStrategy', 'application_auth_strategy', this.authStrategies, request, options, (id, labels) => ({
      ...clone(request),
      id,
      labels,
    }));
  }

  async updateAuthStrategy(
    id: string,
    request: UpdateAuthStrategyRequest,
    options?: RequestOptions,
  ): Promise<AuthStrategy> {
    const { labels, ...rest } = request;
    return this.patch(
      'updateAuthStrategy',
      'application_auth_strategy',
      this.authStrategies,
      id,
      labels,
      options,
      (current) => ({ ...current, ...clone(rest) }),
    );
  }

  async deleteAuthStrategy(id: string, options?: RequestOptions): Promise<void> {
    this.remove('deleteAuthStrategy', 'application_auth_strategy', this.authStrategies, id, options);
  }

  async getPortalCustomization(portalId: string, options?: RequestOptions): Promise<PortalCustomization | undefined> {
    this.enter('getPortalCustomization', options);
    const stored = this.customizations.get(portalId);
    return stored ? clone(stored) : undefined;
  }

  async updatePortalCustomization(
    portalId: string,
    request: UpdatePortalCustomizationRequest,
    options?: RequestOptions,
  ): Promise<PortalCustomization> {
    this.enter('updatePortalCustomization', options);
    if (!this.portals.has(portalId)) {
      throw new Error(`portal '${portalId}' not found`);
    }
    const merged: PortalCustomization = { ...this.customizations.get(portalId), ...clone(request), portalId };
    this.customizations.set(portalId, merged);
    return clone(merged);
  }

  async listGatewayServices(controlPlaneId: string, options?: RequestOptions): Promise<GatewayService[]> {
    this.enter('listGatewayServices', options);
    return [...this.gatewayServices.values()]
      .filter((service) => service.controlPlaneId === controlPlaneId)
      .map(clone);
  }

  private enter(call: string, options: RequestOptions | undefined): void {
    this.calls.push(call);
    options?.signal?.throwIfAborted();
  }

  private stamp(labels: ApiLabels): ApiLabels {
    return { ...labels, [MANAGED_KEY]: TRUE_VALUE, [LAST_UPDATED_KEY]: formatLastUpdated(this.now()) };
  }

  private seed<T extends Named>(store: Map<string, T>, resource: T): T {
    store.set(resource.id, clone(resource));
    return clone(resource);
  }

  private findByName<T extends Named>(
    call: string,
    store: Map<string, T>,
    name: string,
    options: RequestOptions | undefined,
  ): T | undefined {
    this.enter(call, options);
    const found = [...store.values()].find((resource) => resource.name === name);
    return found ? clone(found) : undefined;
  }

  private findById<T extends Named>(
    call: string,
    store: Map<string, T>,
    id: string,
    options: RequestOptions | undefined,
  ): T | undefined {
    this.enter(call, options);
    const found = store.get(id);
    return found ? clone(found) : undefined;
  }

  private insert<T extends Named>(
    call: string,
    resourceType: string,
    store: Map<string, T>,
    request: { name: string; labels: LabelMap },
    options: RequestOptions | undefined,
    build: (id: string, labels: ApiLabels) => T,
  ): T {
    this.enter(call, options);
    if ([...store.values()].some((resource) => resource.name === request.name)) {
      throw new Error(`${resourceType} '${request.name}' already exists`);
    }
    return this.persist(store, build(this.generateId(), { ...request.labels }));
  }

  private patch<T extends Named>(
    call: string,
    resourceType: string,
    store: Map<string, T>,
    id: string,
    labelUpdate: LabelUpdate | undefined,
    options: RequestOptions | undefined,
    apply: (current: T) => T,
  ): T {
    this.enter(call, options);
    const current = store.get(id);
    if (!current) {
      throw new Error(`${resourceType} '${id}' not found`);
    }
    const labels = applyLabelUpdate(current.labels, labelUpdate);
    return this.persist(store, { ...apply(current), id, labels });
  }

  private persist<T extends Named>(store: Map<string, T>, resource: T): T {
    const stamped = { ...resource, labels: this.stamp(resource.labels) };
    store.set(stamped.id, stamped);
    return clone(stamped);
  }

  private remove<T extends Named>(
    call: string,
    resourceType: string,
    store: Map<string, T>,
    id: string,
    options: RequestOptions | undefined,
  ): void {
    this.enter(call, options);
    if (!store.delete(id)) {
      throw new Error(`${resourceType} '${id}' not found`);
    }
  }

  private requireApi(apiId: string): void {
    if (!this.apis.has(apiId)) {
      throw new Error(`api '${apiId}' not found`);
    }
  }
}

function applyLabelUpdate(current: ApiLabels, update: LabelUpdate | undefined): ApiLabels {
  if (!update) {
    return { ...current };
  }
  const kept = Object.entries(current).filter(([key]) => !Object.hasOwn(update, key));
  const written = Object.entries(update).filter((entry): entry is [string, string] => entry[1] !== null);
  return Object.fromEntries([...kept, ...written]);
}

