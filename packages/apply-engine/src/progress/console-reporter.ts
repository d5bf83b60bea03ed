import type { Writable } from 'node:stream';

import { Chalk, type ChalkInstance } from 'chalk';
import { UNKNOWN_ID } from '@resctl/plan-operations';
import type { ActionType, Plan, PlannedChange } from '@resctl/plan-operations';

import type { ExecutionError, ExecutionResult, ProgressReporter } from '../contracts.js';

export interface ConsoleReporterOptions {
  /** Prints the validation header instead of the apply header. */
  dryRun?: boolean;
  /** Defaults to whether the stream is a TTY. */
  color?: boolean;
}

interface NamespaceStats {
  succeeded: number;
  failed: number;
  skipped: number;
}

const DEFAULT_NAMESPACE = 'default';

export function actionVerb(action: ActionType): string {
  switch (action) {
    case 'CREATE':
      return 'Creating';
    case 'UPDATE':
      return 'Updating';
    case 'DELETE':
      return 'Deleting';
    case 'EXTERNAL_TOOL':
      return 'Running';
  }
}

/**
 * Display name for a change. Resources the planner could not name by ref
 * are described by their monikers.
 */
export function progressName(change: PlannedChange): string {
  const monikers = change.resourceMonikers ?? {};
  if (change.resourceRef === UNKNOWN_ID && Object.keys(monikers).length > 0) {
    if (change.resourceType === 'api_publication' && monikers.portal_name) {
      return monikers.api_ref
        ? `api:${monikers.api_ref} published to portal:${monikers.portal_name}`
        : `published to portal:${monikers.portal_name}`;
    }
    return Object.entries(monikers)
      .map(([key, value]) => `${key}=${value}`)
      .sort()
      .join(', ');
  }
  return change.resourceRef || `${change.resourceType}/${change.id}`;
}

function namespaceOf(change: PlannedChange): string {
  return change.namespace || DEFAULT_NAMESPACE;
}

function isTTY(stream: Writable): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

export class ConsoleReporter implements ProgressReporter {
  private readonly style: ChalkInstance;
  private readonly dryRun: boolean;
  private total = 0;
  private index = 0;
  private readonly namespaces = new Map<string, NamespaceStats>();

  constructor(
    private readonly stream: Writable = process.stdout,
    options: ConsoleReporterOptions = {},
  ) {
    this.dryRun = options.dryRun ?? false;
    this.style = new Chalk({ level: (options.color ?? isTTY(stream)) ? 1 : 0 });
  }

  startExecution(plan: Plan): void {
    this.total = plan.summary.totalChanges;
    this.index = 0;
    this.namespaces.clear();

    if (this.total === 0) {
      this.line('No changes to execute.');
      return;
    }
    this.line(this.style.bold(this.dryRun ? 'Validating changes:' : 'Applying changes:'));
  }

  startChange(change: PlannedChange): void {
    this.index += 1;
    const namespace = namespaceOf(change);
    if (!this.namespaces.has(namespace)) {
      this.namespaces.set(namespace, { succeeded: 0, failed: 0, skipped: 0 });
    }

    const description = `[namespace: ${namespace}] ${actionVerb(change.action)} ${change.resourceType}: ${progressName(change)}... `;
    const prefix = this.total > 0 ? `[${this.index}/${this.total}]` : '•';
    this.write(`${prefix} ${description}`);
  }

  completeChange(change: PlannedChange, error?: Error): void {
    const stats = this.namespaces.get(namespaceOf(change));
    if (error) {
      this.line(this.style.red(`✗ Error: ${error.message}`));
      if (stats) {
        stats.failed += 1;
      }
      return;
    }
    this.line(this.style.green('✓'));
    if (stats) {
      stats.succeeded += 1;
    }
  }

  skipChange(change: PlannedChange, reason: string): void {
    const stats = this.namespaces.get(namespaceOf(change));
    if (stats) {
      stats.skipped += 1;
    }
    this.line(this.style.yellow(`⚠ Skipped: ${reason}`));
  }

  finishExecution(result: ExecutionResult): void {
    this.line('');

    if (this.namespaces.size > 1) {
      this.line('');
      this.line('Namespace Summary:');
      for (const namespace of [...this.namespaces.keys()].sort()) {
        const summary = this.namespaceSummary(namespace, result.dryRun);
        if (summary) {
          this.line(`  ${namespace}: ${summary}`);
        }
      }
      this.line('');
    }

    if (result.dryRun) {
      this.line('Dry run complete.');
      if (result.skippedCount > 0) {
        this.line(`${result.skippedCount} changes would be applied.`);
      }
      if (result.failureCount > 0) {
        this.errorList('Validation errors:', result.errors);
      }
      return;
    }

    this.line('Complete.');
    if (result.successCount > 0) {
      this.line(`Applied ${result.successCount} changes.`);
    }
    if (result.failureCount > 0 && result.errors.length > 0) {
      this.errorList('Errors:', result.errors);
    }
  }

  private namespaceSummary(namespace: string, dryRun: boolean): string {
    const stats = this.namespaces.get(namespace);
    if (!stats) {
      return '';
    }
    const parts: string[] = [];
    if (stats.succeeded > 0) {
      parts.push(`${stats.succeeded} succeeded`);
    }
    if (stats.failed > 0) {
      parts.push(`${stats.failed} failed`);
    }
    if (stats.skipped > 0 && dryRun) {
      parts.push(`${stats.skipped} validated`);
    }
    return parts.join(', ');
  }

  private errorList(title: string, errors: readonly ExecutionError[]): void {
    this.line('');
    this.line(this.style.red(title));
    for (const entry of errors) {
      this.line(`  • ${entry.resourceType} ${entry.resourceName}: ${entry.error}`);
    }
  }

  private write(text: string): void {
    this.stream.write(text);
  }

  private line(text: string): void {
    this.stream.write(`${text}\n`);
  }
}
