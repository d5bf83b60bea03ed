/**
 * Remote state API as seen by the adapters. The transport behind it (HTTP,
 * auth, pagination) is the concern of the implementation.
 */

import type { LabelMap, LabelUpdate } from '../labels/labels.js';

export interface RequestOptions {
  signal?: AbortSignal;
}

/** Label maps as the API returns them: values may be null. */
export type ApiLabels = Record<string, string | null>;

export interface Portal {
  id: string;
  name: string;
  displayName?: string;
  description?: string;
  authenticationEnabled?: boolean;
  rbacEnabled?: boolean;
  autoApproveDevelopers?: boolean;
  autoApproveApplications?: boolean;
  defaultApiVisibility?: string;
  defaultPageVisibility?: string;
  defaultApplicationAuthStrategyId?: string;
  labels: ApiLabels;
}

export type CreatePortalRequest = Omit<Portal, 'id' | 'labels'> & { labels: LabelMap };
export type UpdatePortalRequest = Partial<Omit<Portal, 'id' | 'labels'>> & { labels?: LabelUpdate };

export interface ControlPlane {
  id: string;
  name: string;
  description?: string;
  clusterType?: string;
  authType?: string;
  cloudGateway?: boolean;
  proxyUrls?: string[];
  labels: ApiLabels;
}

export type CreateControlPlaneRequest = Omit<ControlPlane, 'id' | 'labels'> & { labels: LabelMap };
export type UpdateControlPlaneRequest = Partial<Omit<ControlPlane, 'id' | 'labels' | 'clusterType' | 'cloudGateway'>> & {
  labels?: LabelUpdate;
};

export interface Api {
  id: string;
  name: string;
  description?: string;
  version?: string;
  slug?: string;
  labels: ApiLabels;
}

export type CreateApiRequest = Omit<Api, 'id' | 'labels'> & { labels: LabelMap };
export type UpdateApiRequest = Partial<Omit<Api, 'id' | 'labels'>> & { labels?: LabelUpdate };

export interface ApiVersion {
  id: string;
  apiId: string;
  version: string;
  specContent?: string;
}

export type CreateApiVersionRequest = Omit<ApiVersion, 'id' | 'apiId'>;

export type PublicationVisibility = 'public' | 'private';

/** Publications are keyed by `(apiId, portalId)` and carry no id of their own. */
export interface ApiPublication {
  apiId: string;
  portalId: string;
  visibility?: PublicationVisibility;
  authStrategyIds?: string[];
  autoApproveRegistrations?: boolean;
}

export type CreateApiPublicationRequest = Omit<ApiPublication, 'apiId' | 'portalId'>;

export interface ServiceBinding {
  id: string;
  controlPlaneId: string;
}

export interface ApiImplementation {
  id: string;
  apiId: string;
  service: ServiceBinding;
}

export type CreateApiImplementationRequest = Omit<ApiImplementation, 'id' | 'apiId'>;

export type AuthStrategyType = 'key_auth' | 'openid_connect';

export interface AuthStrategy {
  id: string;
  name: string;
  displayName?: string;
  strategyType: AuthStrategyType;
  configs: Record<string, unknown>;
  labels: ApiLabels;
}

export type CreateAuthStrategyRequest = Omit<AuthStrategy, 'id' | 'labels'> & { labels: LabelMap };
export type UpdateAuthStrategyRequest = {
  displayName?: string;
  configs?: Record<string, unknown>;
  labels?: LabelUpdate;
};

export interface PortalTheme {
  name?: string;
  mode?: 'light' | 'dark' | 'system';
  colors?: { primary?: string };
}

export interface PortalMenuItem {
  path: string;
  title: string;
  visibility?: string;
  external?: boolean;
}

export interface PortalCustomization {
  portalId: string;
  theme?: PortalTheme;
  layout?: string;
  css?: string;
  menu?: { main?: PortalMenuItem[]; footerSections?: Array<{ title: string; items: PortalMenuItem[] }> };
}

export type UpdatePortalCustomizationRequest = Omit<PortalCustomization, 'portalId'>;

export interface GatewayService {
  id: string;
  name: string;
  controlPlaneId: string;
  host?: string;
}

export interface StateClient {
  getPortalByName(name: string, options?: RequestOptions): Promise<Portal | undefined>;
  getPortalById(id: string, options?: RequestOptions): Promise<Portal | undefined>;
  createPortal(request: CreatePortalRequest, options?: RequestOptions): Promise<Portal>;
  updatePortal(id: string, request: UpdatePortalRequest, options?: RequestOptions): Promise<Portal>;
  deletePortal(id: string, options?: RequestOptions): Promise<void>;

  getControlPlaneByName(name: string, options?: RequestOptions): Promise<ControlPlane | undefined>;
  getControlPlaneById(id: string, options?: RequestOptions): Promise<ControlPlane | undefined>;
  createControlPlane(request: CreateControlPlaneRequest, options?: RequestOptions): Promise<ControlPlane>;
  updateControlPlane(id: string, request: UpdateControlPlaneRequest, options?: RequestOptions): Promise<ControlPlane>;
  deleteControlPlane(id: string, options?: RequestOptions): Promise<void>;

  getApiByName(name: string, options?: RequestOptions): Promise<Api | undefined>;
  getApiById(id: string, options?: RequestOptions): Promise<Api | undefined>;
  createApi(request: CreateApiRequest, options?: RequestOptions): Promise<Api>;
  updateApi(id: string, request: UpdateApiRequest, options?: RequestOptions): Promise<Api>;
  deleteApi(id: string, options?: RequestOptions): Promise<void>;

  listApiVersions(apiId: string, options?: RequestOptions): Promise<ApiVersion[]>;
  createApiVersion(apiId: string, request: CreateApiVersionRequest, options?: RequestOptions): Promise<ApiVersion>;
  deleteApiVersion(apiId: string, versionId: string, options?: RequestOptions): Promise<void>;

  listApiPublications(apiId: string, options?: RequestOptions): Promise<ApiPublication[]>;
  createApiPublication(
    apiId: string,
    portalId: string,
    request: CreateApiPublicationRequest,
    options?: RequestOptions,
  ): Promise<ApiPublication>;
  deleteApiPublication(apiId: string, portalId: string, options?: RequestOptions): Promise<void>;

  listApiImplementations(apiId: string, options?: RequestOptions): Promise<ApiImplementation[]>;
  createApiImplementation(
    apiId: string,
    request: CreateApiImplementationRequest,
    options?: RequestOptions,
  ): Promise<ApiImplementation>;
  deleteApiImplementation(apiId: string, implementationId: string, options?: RequestOptions): Promise<void>;

  getAuthStrategyByName(name: string, options?: RequestOptions): Promise<AuthStrategy | undefined>;
  getAuthStrategyById(id: string, options?: RequestOptions): Promise<AuthStrategy | undefined>;
  createAuthStrategy(request: CreateAuthStrategyRequest, options?: RequestOptions): Promise<AuthStrategy>;
  updateAuthStrategy(id: string, request: UpdateAuthStrategyRequest, options?: RequestOptions): Promise<AuthStrategy>;
  deleteAuthStrategy(id: string, options?: RequestOptions): Promise<void>;

  getPortalCustomization(portalId: string, options?: RequestOptions): Promise<PortalCustomization | undefined>;
  updatePortalCustomization(
    portalId: string,
    request: UpdatePortalCustomizationRequest,
    options?: RequestOptions,
  ): Promise<PortalCustomization>;

  listGatewayServices(controlPlaneId: string, options?: RequestOptions): Promise<GatewayService[]>;
}
