import { ApiAdapter } from './adapters/api-adapter.js';
import { ApiImplementationAdapter } from './adapters/api-implementation-adapter.js';
import { ApiPublicationAdapter } from './adapters/api-publication-adapter.js';
import { ApiVersionAdapter } from './adapters/api-version-adapter.js';
import { AuthStrategyAdapter } from './adapters/auth-strategy-adapter.js';
import { bindExecutor } from './adapters/binding.js';
import { ControlPlaneAdapter } from './adapters/control-plane-adapter.js';
import { PortalAdapter } from './adapters/portal-adapter.js';
import { PortalCustomizationAdapter } from './adapters/portal-customization-adapter.js';
import type { StateClient } from './client/types.js';
import { BaseCreateDeleteExecutor } from './executor/base-create-delete-executor.js';
import { BaseExecutor } from './executor/base-executor.js';
import { BaseSingletonExecutor } from './executor/base-singleton-executor.js';
import { createGatewaySyncHandler, type GatewaySyncOptions } from './external-tool/gateway-sync-step.js';
import { AdapterRegistry } from './operation-registry.js';

export type DefaultRegistryOptions = Omit<GatewaySyncOptions, 'client'>;

/**
 * Registers the built-in resource types. Callers may override or add types
 * afterwards through `register`.
 */
export function createDefaultRegistry(
  client: StateClient | undefined,
  options: DefaultRegistryOptions = {},
): AdapterRegistry {
  const registry = new AdapterRegistry();

  registry.register(
    'portal',
    bindExecutor(new BaseExecutor(new PortalAdapter(client)), {
      references: [
        {
          key: 'default_application_auth_strategy_id',
          resourceType: 'application_auth_strategy',
          optional: true,
        },
      ],
    }),
  );
  registry.register('control_plane', bindExecutor(new BaseExecutor(new ControlPlaneAdapter(client))));
  registry.register('api', bindExecutor(new BaseExecutor(new ApiAdapter(client))));
  registry.register('application_auth_strategy', bindExecutor(new BaseExecutor(new AuthStrategyAdapter(client))));

  registry.register(
    'api_version',
    bindExecutor(new BaseCreateDeleteExecutor(new ApiVersionAdapter(client)), {
      references: [{ key: 'api_id', resourceType: 'api', parent: true }],
    }),
  );
  registry.register(
    'api_publication',
    bindExecutor(new BaseCreateDeleteExecutor(new ApiPublicationAdapter(client)), {
      references: [
        { key: 'api_id', resourceType: 'api', parent: true },
        { key: 'portal_id', resourceType: 'portal' },
      ],
    }),
  );
  registry.register(
    'api_implementation',
    bindExecutor(new BaseCreateDeleteExecutor(new ApiImplementationAdapter(client)), {
      references: [
        { key: 'api_id', resourceType: 'api', parent: true },
        {
          key: 'control_plane_id',
          resourceType: 'control_plane',
          referenceKey: 'service.control_plane_id',
          optional: true,
        },
      ],
    }),
  );

  // A customization always exists once its portal does, so a create is an update.
  const customization = bindExecutor(new BaseSingletonExecutor(new PortalCustomizationAdapter(client)), {
    references: [{ key: 'portal_id', resourceType: 'portal', parent: true }],
    singleton: true,
  });
  if (customization.update) {
    customization.create = customization.update;
  }
  registry.register('portal_customization', customization);

  registry.register('gateway_sync', { externalTool: createGatewaySyncHandler({ ...options, client }) });

  return registry;
}
