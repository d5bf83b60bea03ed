import { UNKNOWN_ID } from '@resctl/plan-operations';
import type { Plan, PlannedChange } from '@resctl/plan-operations';

import { changeDisplayName } from './adapters/fields.js';
import type { StateClient } from './client/types.js';
import { parseExecutorConfig, type ExecutorConfig, type ExecutorConfigInput } from './config.js';
import type {
  AppliedChange,
  ChangeDescriptor,
  ExecutionError,
  ExecutionOptions,
  ExecutionResult,
  Executor,
  ProgressReporter,
  ValidationResult,
} from './contracts.js';
import { createDefaultRegistry } from './default-registry.js';
import { NotImplementedError, ValidationError, toError } from './errors.js';
import { createExecaRunner, type ExternalToolRunner } from './external-tool/runner.js';
import { createLogger, type Logger } from './logging/logger.js';
import type { AdapterRegistry, HandlerContext } from './operation-registry.js';
import { createClientLookup } from './resolver/client-lookup.js';
import { ReferenceResolver } from './resolver/reference-resolver.js';

export interface ApplyExecutorOptions {
  /** Remote API. Without one, only changes that need no remote call succeed. */
  client?: StateClient;
  /** Defaults to the built-in resource types bound to `client`. */
  registry?: AdapterRegistry;
  reporter?: ProgressReporter;
  logger?: Logger;
  config?: ExecutorConfigInput;
  /** Runs the external sync tool; defaults to an execa-backed runner. */
  runner?: ExternalToolRunner;
}

interface ResultAccumulator {
  successCount: number;
  failureCount: number;
  skippedCount: number;
  errors: ExecutionError[];
  changesApplied: AppliedChange[];
  validationResults: ValidationResult[];
}

export function createExecutor(options: ApplyExecutorOptions = {}): Executor {
  const config: ExecutorConfig = parseExecutorConfig(options.config ?? {});
  const logger = (options.logger ?? createLogger({ level: config.logLevel })).child('executor');
  const client = options.client;
  const registry =
    options.registry ??
    createDefaultRegistry(client, {
      runner: options.runner ?? createExecaRunner({ command: config.externalTool.command }),
      mode: config.mode,
      planBaseDir: config.planBaseDir,
      token: config.externalTool.token,
      address: config.externalTool.address,
    });

  return {
    async execute(plan: Plan | null | undefined, execOptions: ExecutionOptions = {}): Promise<ExecutionResult> {
      if (!plan) {
        throw new ValidationError('plan is required');
      }

      const dryRun = execOptions.dryRun ?? config.dryRun;
      const reporter = execOptions.reporter ?? options.reporter;
      const signal = execOptions.signal;
      const resolver = new ReferenceResolver({
        lookup: client ? createClientLookup(client) : undefined,
        logger: logger.child('resolver'),
      });
      // Dry-run patch-back lands on a copy so the caller's plan stays as given.
      const working = dryRun ? structuredClone(plan) : plan;
      const context: HandlerContext = {
        plan: working,
        dryRun,
        mode: config.mode ?? plan.metadata.mode,
        logger,
        resolver,
      };
      if (signal) {
        context.signal = signal;
      }

      const changesById = new Map(working.changes.map((change) => [change.id, change]));
      const acc: ResultAccumulator = {
        successCount: 0,
        failureCount: 0,
        skippedCount: 0,
        errors: [],
        changesApplied: [],
        validationResults: [],
      };

      reporter?.startExecution(plan);
      logger.debug('Starting execution', { changes: plan.executionOrder.length, dryRun });

      for (const changeId of working.executionOrder) {
        const change = changesById.get(changeId);
        if (!change) {
          recordMissingChange(acc, changeId, dryRun);
          logger.warn('Execution order names an unknown change', { changeId });
          continue;
        }

        reporter?.startChange(change);
        const descriptor = describeChange(change);
        logger.debug('Executing change', { changeId, action: change.action, resourceType: change.resourceType });

        try {
          signal?.throwIfAborted();
          validateChangePreExecution(change, registry);

          const handler = registry.resolve(change.resourceType, change.action);
          if (!handler) {
            throw new NotImplementedError(
              `${change.action} operation not yet implemented for ${change.resourceType}`,
            );
          }

          const outcome = await handler(change, context);
          if (change.action === 'CREATE' && outcome.resourceId) {
            resolver.record(change.resourceType, change.resourceRef, outcome.resourceId);
          }

          if (dryRun) {
            acc.validationResults.push({ ...descriptor, status: 'would_succeed', validation: 'passed' });
            acc.skippedCount += 1;
            reporter?.skipChange(change, 'dry-run mode');
          } else {
            const applied: AppliedChange = { ...descriptor };
            if (outcome.resourceId) {
              applied.resourceId = outcome.resourceId;
            }
            acc.changesApplied.push(applied);
            acc.successCount += 1;
            reporter?.completeChange(change);
          }
          logger.debug('Change succeeded', { changeId, resourceId: outcome.resourceId });
        } catch (error) {
          const err = toError(error);
          acc.errors.push({ ...descriptor, error: err.message });
          acc.failureCount += 1;
          if (dryRun) {
            acc.validationResults.push({
              ...descriptor,
              status: 'would_fail',
              validation: 'failed',
              message: err.message,
            });
          }
          reporter?.completeChange(change, err);
          logger.debug('Change failed', { changeId, error: err.message });
        }
      }

      const result = freezeResult(acc, dryRun);
      reporter?.finishExecution(result);
      logger.debug('Execution finished', {
        successCount: result.successCount,
        failureCount: result.failureCount,
        skippedCount: result.skippedCount,
      });
      return result;
    },
  };
}

/** UPDATE and DELETE address an existing resource and need its id. */
export function validateChangePreExecution(change: PlannedChange, registry?: AdapterRegistry): void {
  if (change.action !== 'UPDATE' && change.action !== 'DELETE') {
    return;
  }
  if (registry?.isSingleton(change.resourceType)) {
    return;
  }
  if (!change.resourceId) {
    throw new ValidationError(`resource ID required for ${change.action} operation`, {
      context: { changeId: change.id, resourceType: change.resourceType },
    });
  }
}

function describeChange(change: PlannedChange): ChangeDescriptor {
  return {
    changeId: change.id,
    resourceType: change.resourceType,
    resourceName: changeDisplayName(change),
    resourceRef: change.resourceRef,
    action: change.action,
  };
}

function recordMissingChange(acc: ResultAccumulator, changeId: string, dryRun: boolean): void {
  const descriptor: ChangeDescriptor = {
    changeId,
    resourceType: UNKNOWN_ID,
    resourceName: UNKNOWN_ID,
    resourceRef: UNKNOWN_ID,
    action: 'UNKNOWN',
  };
  const message = `change ${changeId} not found in plan`;
  acc.errors.push({ ...descriptor, error: message });
  acc.failureCount += 1;
  if (dryRun) {
    acc.validationResults.push({ ...descriptor, status: 'would_fail', validation: 'failed', message });
  }
}

function freezeResult(acc: ResultAccumulator, dryRun: boolean): ExecutionResult {
  return Object.freeze({
    successCount: acc.successCount,
    failureCount: acc.failureCount,
    skippedCount: acc.skippedCount,
    errors: Object.freeze([...acc.errors]),
    changesApplied: Object.freeze([...acc.changesApplied]),
    validationResults: Object.freeze([...acc.validationResults]),
    dryRun,
  });
}
