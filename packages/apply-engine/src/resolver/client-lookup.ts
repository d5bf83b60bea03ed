import type { StateClient } from '../client/types.js';
import { ReferenceResolutionError } from '../errors.js';
import type { ReferenceLookup } from './reference-resolver.js';

export function createClientLookup(client: StateClient): ReferenceLookup {
  return {
    async lookupId(resourceType, name, options) {
      switch (resourceType) {
        case 'portal':
          return (await client.getPortalByName(name, options))?.id;
        case 'control_plane':
          return (await client.getControlPlaneByName(name, options))?.id;
        case 'api':
          return (await client.getApiByName(name, options))?.id;
        case 'application_auth_strategy':
          return (await client.getAuthStrategyByName(name, options))?.id;
        default:
          throw new ReferenceResolutionError(`lookup by name is not supported for ${resourceType}`);
      }
    },
  };
}
