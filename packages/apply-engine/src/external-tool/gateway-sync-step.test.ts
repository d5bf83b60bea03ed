import { describe, expect, it, vi } from 'vitest';
import { PlanBuilder, formatRefPlaceholder } from '@resctl/plan-operations';
import type { Plan, PlannedChange } from '@resctl/plan-operations';

import { MemoryStateClient } from '../client/memory-client.js';
import { ExternalToolError } from '../errors.js';
import { MemoryTransport, createLogger } from '../logging/logger.js';
import type { HandlerContext } from '../operation-registry.js';
import { ReferenceResolver } from '../resolver/reference-resolver.js';
import { createGatewaySyncHandler, ensureOutputFlags, parseFiles, selectorName } from './gateway-sync-step.js';
import type { ExternalToolRunOptions, ExternalToolRunResult } from './runner.js';

interface Setup {
  plan: Plan;
  sync: PlannedChange;
  implementation: PlannedChange;
  removal: PlannedChange;
}

function buildPlan(syncFields: Record<string, unknown>, withDependents = true): Setup {
  const builder = new PlanBuilder({ mode: 'sync' })
    .create('control_plane', 'cp-ref', { name: 'edge' })
    .externalTool('gateway_sync', 'svc-ref', syncFields);
  if (withDependents) {
    builder
      .create('api_implementation', 'impl', {
        service: { id: formatRefPlaceholder('svc-ref'), control_plane_id: formatRefPlaceholder('cp-ref') },
      })
      .delete('api_implementation', 'old-impl', 'impl-0', { service: { id: 'svc-ref' } });
  }
  const plan = builder.build();
  const [, sync, implementation, removal] = plan.changes;
  if (!sync) {
    throw new Error('plan is missing the sync change');
  }
  const placeholder: PlannedChange = { ...sync, id: 'none' };
  return { plan, sync, implementation: implementation ?? placeholder, removal: removal ?? placeholder };
}

const defaultFields = {
  control_plane_ref: 'cp-ref',
  selector: { matchFields: { name: 'orders-svc' } },
  files: ['kong.yaml'],
  deck_base_dir: 'gateway',
};

function createRunner(result: ExternalToolRunResult = { stdout: 'ok', stderr: '' }) {
  return { run: vi.fn(async (_options: ExternalToolRunOptions) => result) };
}

function createContext(plan: Plan, dryRun = false): { context: HandlerContext; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = createLogger({ level: 'debug', transports: [transport] });
  const resolver = new ReferenceResolver({ logger });
  resolver.record('control_plane', 'cp-ref', 'cp-1');
  return { context: { plan, dryRun, mode: plan.metadata.mode, logger, resolver }, transport };
}

function seededClient(): MemoryStateClient {
  const client = new MemoryStateClient();
  client.seedGatewayService({ id: 'svc-1', name: 'orders-svc', controlPlaneId: 'cp-1' });
  client.seedGatewayService({ id: 'svc-2', name: 'billing', controlPlaneId: 'cp-1' });
  return client;
}

const handlerOptions = { planBaseDir: '/plans', token: 'test-token', address: 'https://api.example.test' };

describe('gateway sync step', () => {
  it('runs the tool and patches later implementation creates', async () => {
    const { plan, sync, implementation, removal } = buildPlan(defaultFields);
    const runner = createRunner();
    const client = seededClient();
    const { context, transport } = createContext(plan);
    const handler = createGatewaySyncHandler({ ...handlerOptions, client, runner });

    const result = await handler(sync, context);

    expect(result).toEqual({ resourceId: 'svc-1' });
    expect(runner.run).toHaveBeenCalledWith({
      args: ['gateway', 'sync', '--json-output', '--no-color', 'kong.yaml'],
      mode: 'sync',
      controlPlaneName: 'edge',
      cwd: '/plans/gateway',
      token: 'test-token',
      address: 'https://api.example.test',
    });
    expect(implementation.fields.service).toEqual({ id: 'svc-1', control_plane_id: 'cp-1' });
    expect(removal.fields.service).toEqual({ id: 'svc-ref' });
    expect(context.resolver.get('gateway_service', 'svc-ref')).toBe('svc-1');
    expect(transport.messages('debug')).toContain('external tool stdout');
  });

  it('records a placeholder id in dry-run without running the tool', async () => {
    const { plan, sync } = buildPlan(defaultFields);
    const runner = createRunner();
    const client = seededClient();
    const { context } = createContext(plan, true);

    const result = await createGatewaySyncHandler({ ...handlerOptions, client, runner })(sync, context);

    expect(result).toEqual({ resourceId: 'dry-run-gateway_service-id' });
    expect(context.resolver.get('gateway_service', 'svc-ref')).toBe('dry-run-gateway_service-id');
    expect(runner.run).not.toHaveBeenCalled();
    expect(client.calls).toEqual([]);
  });

  it('leaves implementations that ran before the sync alone', async () => {
    const { plan, sync, implementation, removal } = buildPlan(defaultFields);
    const [controlPlane] = plan.changes;
    plan.executionOrder = [controlPlane?.id ?? '', implementation.id, sync.id, removal.id];
    const client = seededClient();
    const { context } = createContext(plan);

    const result = await createGatewaySyncHandler({ ...handlerOptions, client, runner: createRunner() })(
      sync,
      context,
    );

    expect(result).toEqual({});
    expect(implementation.fields.service).toEqual({
      id: formatRefPlaceholder('svc-ref'),
      control_plane_id: formatRefPlaceholder('cp-ref'),
    });
    expect(client.calls).toEqual([]);
  });

  it('skips service resolution when nothing depends on it', async () => {
    const { plan, sync } = buildPlan(defaultFields, false);
    const client = seededClient();
    const { context } = createContext(plan);

    const result = await createGatewaySyncHandler({ ...handlerOptions, client, runner: createRunner() })(
      sync,
      context,
    );

    expect(result).toEqual({});
    expect(client.calls).toEqual([]);
  });

  it('asks the client for the control plane name when the plan lacks it', async () => {
    const client = seededClient();
    client.seedControlPlane({ id: 'cp-9', name: 'remote-edge', labels: {} });
    const { plan, sync } = buildPlan(
      { control_plane_id: 'cp-9', selector_name: 'orders-svc', files: ['kong.yaml'], flags: ['--select-tag=orders'] },
      false,
    );
    const runner = createRunner();
    const { context } = createContext(plan);

    await createGatewaySyncHandler({ client, runner, token: 'test-token', address: 'https://api.example.test' })(
      sync,
      context,
    );

    expect(runner.run.mock.calls[0]?.[0]).toMatchObject({
      args: ['gateway', 'sync', '--select-tag=orders', '--json-output', '--no-color', 'kong.yaml'],
      controlPlaneName: 'remote-edge',
    });
    expect(client.calls).toEqual(['getControlPlaneById']);
  });

  it('requires a selector name', async () => {
    const { plan, sync } = buildPlan({ ...defaultFields, selector: {} });
    const { context } = createContext(plan);

    await expect(createGatewaySyncHandler(handlerOptions)(sync, context)).rejects.toThrow(
      'gateway_sync svc-ref: selector.matchFields.name is required',
    );
  });

  it('requires a control plane', async () => {
    const { plan, sync } = buildPlan({ selector_name: 'orders-svc', files: ['kong.yaml'] });
    const { context } = createContext(plan);

    await expect(createGatewaySyncHandler(handlerOptions)(sync, context)).rejects.toThrow(
      'gateway_sync requires control_plane_ref or control_plane_id',
    );
  });

  it('validates files and flags', async () => {
    const { context } = createContext(buildPlan(defaultFields).plan);
    const handler = createGatewaySyncHandler({ ...handlerOptions, runner: createRunner() });

    const noFiles = buildPlan({ ...defaultFields, files: [] });
    await expect(handler(noFiles.sync, context)).rejects.toThrow('gateway_sync svc-ref: files are required');

    const badFlag = buildPlan({ ...defaultFields, flags: ['select-tag'] });
    await expect(handler(badFlag.sync, context)).rejects.toThrow('gateway_sync svc-ref: flags[0] must be a flag');
  });

  it('fails when the selector matches several services', async () => {
    const { plan, sync } = buildPlan(defaultFields);
    const client = seededClient();
    client.seedGatewayService({ id: 'svc-3', name: 'orders-svc', controlPlaneId: 'cp-1' });
    const { context } = createContext(plan);

    await expect(
      createGatewaySyncHandler({ ...handlerOptions, client, runner: createRunner() })(sync, context),
    ).rejects.toThrow('gateway_service selector matched multiple services for name "orders-svc"');
  });

  it('wraps tool failures and logs stderr', async () => {
    const { plan, sync } = buildPlan(defaultFields);
    const runner = {
      run: vi.fn(async (): Promise<ExternalToolRunResult> => {
        throw new ExternalToolError('deck failed: exit 1', { stderr: 'invalid file' });
      }),
    };
    const { context, transport } = createContext(plan);

    const failure = createGatewaySyncHandler({ ...handlerOptions, client: seededClient(), runner })(sync, context);

    await expect(failure).rejects.toBeInstanceOf(ExternalToolError);
    await expect(failure).rejects.toThrow('gateway sync for gateway_service svc-ref failed: deck failed: exit 1');
    expect(transport.entries.find((entry) => entry.level === 'error')?.metadata).toEqual({
      gatewayServiceRef: 'svc-ref',
      stderr: 'invalid file',
    });
  });
});

describe('gateway sync field parsing', () => {
  it('reads the selector from either spelling', () => {
    expect(selectorName({ selector_name: ' orders ' })).toBe('orders');
    expect(selectorName({ selector: { match_fields: { name: 'billing' } } })).toBe('billing');
    expect(selectorName({ selector: 'orders' })).toBe('');
  });

  it('rejects empty and flag-like files', () => {
    expect(() => parseFiles(['kong.yaml', ' '])).toThrow('files[1] cannot be empty');
    expect(() => parseFiles(['--state'])).toThrow('files[0] must be a file path, not a flag');
    expect(() => parseFiles('kong.yaml')).toThrow('files must be an array of strings');
  });

  it('adds output flags once', () => {
    expect(ensureOutputFlags(['--no-color'])).toEqual(['--no-color', '--json-output']);
  });
});
