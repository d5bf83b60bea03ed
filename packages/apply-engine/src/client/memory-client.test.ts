import { describe, expect, it } from 'vitest';

import { LAST_UPDATED_KEY, MANAGED_KEY } from '../labels/labels.js';
import { MemoryStateClient } from './memory-client.js';

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `id-${next}`;
  };
}

function createClient(): MemoryStateClient {
  return new MemoryStateClient({
    now: () => new Date('2026-05-06T07:08:09.000Z'),
    generateId: sequentialIds(),
  });
}

describe('MemoryStateClient', () => {
  it('stamps bookkeeping labels on create', async () => {
    const client = createClient();
    const portal = await client.createPortal({ name: 'dev-portal', labels: { team: 'core' } });

    expect(portal).toEqual({
      id: 'id-1',
      name: 'dev-portal',
      labels: { team: 'core', [MANAGED_KEY]: 'true', [LAST_UPDATED_KEY]: '20260506-070809Z' },
    });
    expect(await client.getPortalByName('dev-portal')).toEqual(portal);
    expect(client.calls).toEqual(['createPortal', 'getPortalByName']);
    expect(client.mutations()).toEqual(['createPortal']);
  });

  it('rejects duplicate names', async () => {
    const client = createClient();
    await client.createApi({ name: 'orders', labels: {} });
    await expect(client.createApi({ name: 'orders', labels: {} })).rejects.toThrow("api 'orders' already exists");
  });

  it('removes labels sent as null on update', async () => {
    const client = createClient();
    const seeded = client.seedControlPlane({ name: 'cp1', labels: { team: 'core', env: 'dev' } });

    const updated = await client.updateControlPlane(seeded.id, {
      description: 'edge',
      labels: { env: null, tier: 'gold' },
    });

    expect(updated.description).toBe('edge');
    expect(updated.labels).toEqual({
      team: 'core',
      tier: 'gold',
      [MANAGED_KEY]: 'true',
      [LAST_UPDATED_KEY]: '20260506-070809Z',
    });
  });

  it('fails updates and deletes of unknown ids', async () => {
    const client = createClient();
    await expect(client.updatePortal('missing', {})).rejects.toThrow("portal 'missing' not found");
    await expect(client.deletePortal('missing')).rejects.toThrow("portal 'missing' not found");
  });

  it('keys publications by api and portal', async () => {
    const client = createClient();
    const api = client.seedApi({ id: 'api-1', name: 'orders', labels: {} });
    const portal = client.seedPortal({ id: 'portal-1', name: 'dev-portal', labels: {} });

    const publication = await client.createApiPublication(api.id, portal.id, { visibility: 'public' });
    expect(publication).toEqual({ apiId: 'api-1', portalId: 'portal-1', visibility: 'public' });
    expect(await client.listApiPublications('api-1')).toEqual([publication]);

    await client.deleteApiPublication('api-1', 'portal-1');
    expect(await client.listApiPublications('api-1')).toEqual([]);
  });

  it('merges portal customization updates', async () => {
    const client = createClient();
    client.seedPortal({ id: 'portal-1', name: 'dev-portal', labels: {} });
    client.seedPortalCustomization({ portalId: 'portal-1', css: 'body {}' });

    await client.updatePortalCustomization('portal-1', { layout: 'Top Navigation' });

    expect(client.getPortalCustomizationSnapshot('portal-1')).toEqual({
      portalId: 'portal-1',
      css: 'body {}',
      layout: 'Top Navigation',
    });
  });

  it('fails a call made with an aborted signal', async () => {
    const client = createClient();
    const controller = new AbortController();
    controller.abort();

    await expect(client.getApiByName('orders', { signal: controller.signal })).rejects.toThrow();
    expect(client.calls).toEqual(['getApiByName']);
  });
});
