import { Writable } from 'node:stream';

import { describe, expect, it } from 'vitest';
import { PlanBuilder, UNKNOWN_ID } from '@resctl/plan-operations';
import type { PlannedChange } from '@resctl/plan-operations';

import type { ExecutionResult } from '../contracts.js';
import { ConsoleReporter, progressName } from './console-reporter.js';

function captureStream(): { stream: Writable; output: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    decodeStrings: false,
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, output: () => chunks.join('') };
}

function firstTwo(changes: PlannedChange[]): [PlannedChange, PlannedChange] {
  const [first, second] = changes;
  if (!first || !second) {
    throw new Error('expected two changes');
  }
  return [first, second];
}

describe('ConsoleReporter', () => {
  it('prints progress, a namespace breakdown and the error list', () => {
    const plan = new PlanBuilder()
      .create('portal', 'dev-portal', { name: 'dev-portal' })
      .update('control_plane', 'cp1', 'cp-1', { name: 'cp1' }, { namespace: 'team-b' })
      .build();
    const [portal, controlPlane] = firstTwo(plan.changes);
    const { stream, output } = captureStream();
    const reporter = new ConsoleReporter(stream, { color: false });
    const result: ExecutionResult = {
      successCount: 1,
      failureCount: 1,
      skippedCount: 0,
      errors: [
        {
          changeId: controlPlane.id,
          resourceType: 'control_plane',
          resourceName: 'cp1',
          resourceRef: 'cp1',
          action: 'UPDATE',
          error: 'boom',
        },
      ],
      changesApplied: [],
      validationResults: [],
      dryRun: false,
    };

    reporter.startExecution(plan);
    reporter.startChange(portal);
    reporter.completeChange(portal);
    reporter.startChange(controlPlane);
    reporter.completeChange(controlPlane, new Error('boom'));
    reporter.finishExecution(result);

    expect(output()).toBe(
      [
        'Applying changes:',
        '[1/2] [namespace: default] Creating portal: dev-portal... ✓',
        '[2/2] [namespace: team-b] Updating control_plane: cp1... ✗ Error: boom',
        '',
        '',
        'Namespace Summary:',
        '  default: 1 succeeded',
        '  team-b: 1 failed',
        '',
        'Complete.',
        'Applied 1 changes.',
        '',
        'Errors:',
        '  • control_plane cp1: boom',
        '',
      ].join('\n'),
    );
  });

  it('reports validation in dry-run', () => {
    const plan = new PlanBuilder().create('portal', 'dev-portal', { name: 'dev-portal' }).build();
    const [portal] = plan.changes;
    const { stream, output } = captureStream();
    const reporter = new ConsoleReporter(stream, { dryRun: true, color: false });

    reporter.startExecution(plan);
    if (portal) {
      reporter.startChange(portal);
      reporter.skipChange(portal, 'dry-run mode');
    }
    reporter.finishExecution({
      successCount: 0,
      failureCount: 0,
      skippedCount: 1,
      errors: [],
      changesApplied: [],
      validationResults: [],
      dryRun: true,
    });

    expect(output()).toBe(
      [
        'Validating changes:',
        '[1/1] [namespace: default] Creating portal: dev-portal... ⚠ Skipped: dry-run mode',
        '',
        'Dry run complete.',
        '1 changes would be applied.',
        '',
      ].join('\n'),
    );
  });

  it('says so when there is nothing to do', () => {
    const { stream, output } = captureStream();
    new ConsoleReporter(stream, { color: false }).startExecution(new PlanBuilder().build());
    expect(output()).toBe('No changes to execute.\n');
  });
});

describe('progressName', () => {
  const base: PlannedChange = {
    id: 'c1',
    action: 'CREATE',
    resourceType: 'api_version',
    resourceRef: UNKNOWN_ID,
    fields: {},
    namespace: 'default',
  };

  it('describes unnamed resources by their monikers', () => {
    expect(progressName({ ...base, resourceMonikers: { version: '1.0.0', parent_api: 'orders' } })).toBe(
      'parent_api=orders, version=1.0.0',
    );
    expect(
      progressName({
        ...base,
        resourceType: 'api_publication',
        resourceMonikers: { portal_name: 'dev-portal', api_ref: 'orders' },
      }),
    ).toBe('api:orders published to portal:dev-portal');
  });

  it('prefers the ref and falls back to type and id', () => {
    expect(progressName({ ...base, resourceRef: 'orders-v1' })).toBe('orders-v1');
    expect(progressName({ ...base, resourceRef: '' })).toBe('api_version/c1');
  });
});
