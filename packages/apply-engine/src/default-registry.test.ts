import { describe, expect, it } from 'vitest';
import { PlanBuilder, formatRefPlaceholder } from '@resctl/plan-operations';

import { mapProxyUrls } from './adapters/control-plane-adapter.js';
import { MemoryStateClient } from './client/memory-client.js';
import { createDefaultRegistry } from './default-registry.js';
import { createExecutor } from './executor.js';
import { createSilentLogger } from './logging/logger.js';

function createClient(): MemoryStateClient {
  let next = 0;
  return new MemoryStateClient({
    generateId: () => {
      next += 1;
      return `id-${next}`;
    },
  });
}

describe('createDefaultRegistry', () => {
  it('registers every built-in resource type', () => {
    const registry = createDefaultRegistry(undefined);

    expect(registry.resourceTypes()).toEqual([
      'portal',
      'control_plane',
      'api',
      'application_auth_strategy',
      'api_version',
      'api_publication',
      'api_implementation',
      'portal_customization',
      'gateway_sync',
    ]);
    expect(registry.isSingleton('portal_customization')).toBe(true);
    expect(registry.resolve('api_version', 'UPDATE')).toBeUndefined();
    expect(registry.resolve('portal_customization', 'CREATE')).toBe(registry.resolve('portal_customization', 'UPDATE'));
  });

  it('links a portal to an auth strategy created earlier in the plan', async () => {
    const client = createClient();
    const plan = new PlanBuilder()
      .create('application_auth_strategy', 'key-auth', {
        name: 'key-auth',
        strategy_type: 'key_auth',
        configs: { key_auth: { key_names: ['apikey'] } },
      })
      .create('portal', 'dev-portal', {
        name: 'dev-portal',
        default_application_auth_strategy_id: formatRefPlaceholder('key-auth'),
      })
      .build();

    const result = await createExecutor({ client, logger: createSilentLogger() }).execute(plan);

    expect(result.errors).toEqual([]);
    expect(await client.getAuthStrategyByName('key-auth')).toMatchObject({
      id: 'id-1',
      strategyType: 'key_auth',
      configs: { key_auth: { key_names: ['apikey'] } },
    });
    expect((await client.getPortalByName('dev-portal'))?.defaultApplicationAuthStrategyId).toBe('id-1');
  });

  it('rejects an unsupported strategy type', async () => {
    const plan = new PlanBuilder()
      .create('application_auth_strategy', 'basic', { name: 'basic', strategy_type: 'basic' })
      .build();

    const result = await createExecutor({ client: createClient(), logger: createSilentLogger() }).execute(plan);

    expect(result.errors[0]?.error).toBe('unsupported strategy_type: basic');
  });

  it('creates control planes with normalized proxy urls', async () => {
    const client = createClient();
    const plan = new PlanBuilder()
      .create('control_plane', 'edge', {
        name: 'edge',
        cluster_type: 'CLUSTER_TYPE_HYBRID',
        proxy_urls: [{ host: 'proxy.example.test', port: 8443 }, 'http://edge.example.test'],
      })
      .build();

    await createExecutor({ client, logger: createSilentLogger() }).execute(plan);

    expect(await client.getControlPlaneByName('edge')).toMatchObject({
      id: 'id-1',
      clusterType: 'CLUSTER_TYPE_HYBRID',
      proxyUrls: ['https://proxy.example.test:8443', 'http://edge.example.test'],
    });
  });
});

describe('mapProxyUrls', () => {
  it('rejects entries without a host', () => {
    expect(mapProxyUrls(undefined)).toBeUndefined();
    expect(() => mapProxyUrls('https://edge.example.test')).toThrow('proxy_urls must be a list');
    expect(() => mapProxyUrls([{ port: 80 }])).toThrow('proxy_urls[0] must be a URL or an object with a host');
  });
});
