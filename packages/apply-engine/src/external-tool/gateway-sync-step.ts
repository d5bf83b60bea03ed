import path from 'node:path';

import { parseRefPlaceholder } from '@resctl/plan-operations';
import type { Plan, PlanMode, PlannedChange } from '@resctl/plan-operations';
import { validate as isUuid } from 'uuid';

import { isRecord } from '../adapters/fields.js';
import type { StateClient } from '../client/types.js';
import {
  ApplyError,
  ExternalToolError,
  ReferenceResolutionError,
  ValidationError,
  toError,
} from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { ChangeHandler, HandlerContext } from '../operation-registry.js';
import { dryRunId } from '../executor/base-executor.js';
import { hasFlag, type ExternalToolRunResult, type ExternalToolRunner } from './runner.js';

export const GATEWAY_SERVICE_TYPE = 'gateway_service';

export interface GatewaySyncOptions {
  client?: StateClient;
  runner?: ExternalToolRunner;
  /** Overrides the plan's own mode. */
  mode?: PlanMode;
  planBaseDir?: string;
  token?: string;
  address?: string;
}

interface ControlPlaneTarget {
  id: string;
  name: string;
}

function stringField(fields: Record<string, unknown>, key: string): string {
  const value = fields[key];
  return typeof value === 'string' ? value.trim() : '';
}

export function selectorName(fields: Record<string, unknown>): string {
  const direct = stringField(fields, 'selector_name');
  if (direct) {
    return direct;
  }
  const selector = fields.selector;
  if (!isRecord(selector)) {
    return '';
  }
  const matchFields = selector.matchFields ?? selector.match_fields;
  return isRecord(matchFields) ? stringField(matchFields, 'name') : '';
}

function parseStringList(raw: unknown, label: string): string[] | undefined {
  if (raw === undefined || raw === null) {
    return undefined;
  }
  if (!Array.isArray(raw) || !raw.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${label} must be an array of strings`);
  }
  return raw.map((item) => item.trim());
}

export function parseFiles(raw: unknown): string[] {
  const files = parseStringList(raw, 'files');
  if (!files || files.length === 0) {
    throw new ValidationError('files are required');
  }
  files.forEach((file, index) => {
    if (file === '') {
      throw new ValidationError(`files[${index}] cannot be empty`);
    }
    if (file.startsWith('-')) {
      throw new ValidationError(`files[${index}] must be a file path, not a flag`);
    }
  });
  return files;
}

export function parseFlags(raw: unknown): string[] {
  const flags = parseStringList(raw, 'flags') ?? [];
  flags.forEach((flag, index) => {
    if (flag === '') {
      throw new ValidationError(`flags[${index}] cannot be empty`);
    }
    if (!flag.startsWith('-')) {
      throw new ValidationError(`flags[${index}] must be a flag`);
    }
  });
  return flags;
}

export function ensureOutputFlags(flags: readonly string[]): string[] {
  const result = [...flags];
  for (const flag of ['--json-output', '--no-color']) {
    if (!hasFlag(result, flag)) {
      result.push(flag);
    }
  }
  return result;
}

function serviceRefMatches(value: unknown, gatewayRef: string): boolean {
  if (typeof value !== 'string' || value.trim() === '') {
    return false;
  }
  const placeholder = parseRefPlaceholder(value);
  if (placeholder) {
    return placeholder.field === 'id' && placeholder.ref === gatewayRef;
  }
  return value === gatewayRef;
}

function referencesGatewayService(change: PlannedChange, gatewayRef: string): boolean {
  const service = change.fields.service;
  return isRecord(service) && serviceRefMatches(service.id, gatewayRef);
}

/** Changes scheduled after `changeId`; every change when it is not in the order. */
export function changesAfter(plan: Plan, changeId: string): PlannedChange[] {
  const position = plan.executionOrder.indexOf(changeId);
  if (position === -1) {
    return plan.changes;
  }
  const later = new Set(plan.executionOrder.slice(position + 1));
  return plan.changes.filter((change) => later.has(change.id));
}

export function planNeedsGatewayService(changes: readonly PlannedChange[], gatewayRef: string): boolean {
  return changes.some(
    (change) =>
      change.resourceType === 'api_implementation' &&
      (change.action === 'CREATE' || change.action === 'UPDATE') &&
      referencesGatewayService(change, gatewayRef),
  );
}

/**
 * Writes the resolved service into later `api_implementation` creates that
 * point at `gatewayRef`. This is the only place plan fields are mutated.
 * Returns the ids of the patched changes.
 */
export function patchGatewayServiceReferences(
  changes: readonly PlannedChange[],
  gatewayRef: string,
  serviceId: string,
  controlPlaneId: string,
): string[] {
  const patched: string[] = [];
  for (const change of changes) {
    if (change.resourceType !== 'api_implementation' || change.action !== 'CREATE') {
      continue;
    }
    const service = change.fields.service;
    if (!isRecord(service) || !serviceRefMatches(service.id, gatewayRef)) {
      continue;
    }
    service.id = serviceId;
    if (controlPlaneId.trim() !== '') {
      service.control_plane_id = controlPlaneId;
    }
    patched.push(change.id);
  }
  return patched;
}

function controlPlaneNameFromPlan(plan: Plan, ref: string): string {
  if (!ref) {
    return '';
  }
  const change = plan.changes.find(
    (candidate) => candidate.resourceType === 'control_plane' && candidate.resourceRef === ref,
  );
  return change ? stringField(change.fields, 'name') : '';
}

function logToolOutput(
  logger: Logger,
  gatewayRef: string,
  output: Partial<ExternalToolRunResult>,
  failed: boolean,
): void {
  const stdout = output.stdout?.trim() ?? '';
  const stderr = output.stderr?.trim() ?? '';
  if (stdout) {
    logger.debug('external tool stdout', { gatewayServiceRef: gatewayRef, stdout });
  }
  if (stderr) {
    if (failed) {
      logger.error('external tool stderr', { gatewayServiceRef: gatewayRef, stderr });
    } else {
      logger.debug('external tool stderr', { gatewayServiceRef: gatewayRef, stderr });
    }
  }
}

export class GatewaySyncStep {
  constructor(private readonly options: GatewaySyncOptions = {}) {}

  async run(change: PlannedChange, context: HandlerContext): Promise<{ resourceId?: string }> {
    const { plan, logger } = context;
    const fields = change.fields;
    const gatewayRef = stringField(fields, 'gateway_service_ref') || change.resourceRef;

    const selector = selectorName(fields);
    if (!selector) {
      throw new ValidationError(`gateway_sync ${gatewayRef}: selector.matchFields.name is required`);
    }

    const controlPlane = await this.resolveControlPlane(change, context);
    const mode = this.resolveMode(plan);
    const files = withStepContext(gatewayRef, () => parseFiles(fields.files));
    const flags = ensureOutputFlags(withStepContext(gatewayRef, () => parseFlags(fields.flags)));
    const cwd = this.resolveWorkDir(stringField(fields, 'deck_base_dir'));
    const args = ['gateway', mode, ...flags, ...files];

    logger.debug('Executing gateway sync', { gatewayServiceRef: gatewayRef, files: files.length, dryRun: context.dryRun });

    if (context.dryRun) {
      logger.debug('Skipping external tool in dry-run', { gatewayServiceRef: gatewayRef, args });
    } else {
      await this.runTool(gatewayRef, context, {
        args,
        mode,
        controlPlaneName: controlPlane.name,
        ...(cwd ? { cwd } : {}),
      });
    }

    const later = changesAfter(plan, change.id);
    if (!planNeedsGatewayService(later, gatewayRef)) {
      logger.debug('No dependent changes; skipping gateway service resolution', { gatewayServiceRef: gatewayRef });
      return {};
    }

    const serviceId = context.dryRun
      ? dryRunId(GATEWAY_SERVICE_TYPE)
      : await this.findGatewayService(controlPlane.id, selector, context.signal);

    context.resolver.record(GATEWAY_SERVICE_TYPE, gatewayRef, serviceId);
    const patched = patchGatewayServiceReferences(later, gatewayRef, serviceId, controlPlane.id);
    logger.debug('Resolved gateway service', {
      gatewayServiceRef: gatewayRef,
      gatewayServiceId: serviceId,
      controlPlaneId: controlPlane.id,
      patched,
    });
    return { resourceId: serviceId };
  }

  private async resolveControlPlane(change: PlannedChange, context: HandlerContext): Promise<ControlPlaneTarget> {
    const fields = change.fields;
    const ref = stringField(fields, 'control_plane_ref');
    let id = stringField(fields, 'control_plane_id');

    if (!id) {
      if (!ref) {
        throw new ValidationError('gateway_sync requires control_plane_ref or control_plane_id');
      }
      id = isUuid(ref)
        ? ref
        : await context.resolver.resolve(
            change,
            { resourceType: 'control_plane', referenceKey: 'control_plane_id', field: 'control_plane_ref' },
            context.signal,
          );
    }

    const name =
      stringField(fields, 'control_plane_name') ||
      controlPlaneNameFromPlan(context.plan, ref) ||
      (await this.controlPlaneNameById(id, context.signal));
    return { id, name };
  }

  private async controlPlaneNameById(id: string, signal: AbortSignal | undefined): Promise<string> {
    const client = this.options.client;
    if (!client) {
      throw new ReferenceResolutionError('a state client is required to resolve the control plane name');
    }
    const controlPlane = await client.getControlPlaneById(id, signal ? { signal } : {});
    if (!controlPlane || controlPlane.name.trim() === '') {
      throw new ReferenceResolutionError(`control plane ${id} not found for gateway sync`);
    }
    return controlPlane.name;
  }

  private resolveMode(plan: Plan): PlanMode {
    const mode: string = this.options.mode ?? plan.metadata.mode;
    if (mode !== 'apply' && mode !== 'sync') {
      throw new ValidationError('gateway sync requires apply or sync mode');
    }
    return mode;
  }

  private resolveWorkDir(raw: string): string | undefined {
    if (!raw) {
      return undefined;
    }
    if (path.isAbsolute(raw)) {
      return path.normalize(raw);
    }
    if (this.options.planBaseDir) {
      return path.join(this.options.planBaseDir, raw);
    }
    return path.resolve(raw);
  }

  private async runTool(
    gatewayRef: string,
    context: HandlerContext,
    run: { args: string[]; mode: PlanMode; controlPlaneName: string; cwd?: string },
  ): Promise<void> {
    const runner = this.options.runner;
    if (!runner) {
      throw new ValidationError('external tool runner not configured');
    }
    try {
      const output = await runner.run({
        ...run,
        ...(this.options.token ? { token: this.options.token } : {}),
        ...(this.options.address ? { address: this.options.address } : {}),
        ...(context.signal ? { signal: context.signal } : {}),
      });
      logToolOutput(context.logger, gatewayRef, output, false);
    } catch (error) {
      if (error instanceof ExternalToolError) {
        logToolOutput(context.logger, gatewayRef, error, true);
        if (error.name === 'ExternalToolNotFoundError') {
          throw error;
        }
        throw new ExternalToolError(
          `gateway sync for gateway_service ${gatewayRef} failed: ${error.message}`,
          { stdout: error.stdout, stderr: error.stderr },
          { cause: error },
        );
      }
      if (error instanceof ApplyError) {
        throw error;
      }
      const err = toError(error);
      throw new ExternalToolError(`gateway sync for gateway_service ${gatewayRef} failed: ${err.message}`, {}, {
        cause: err,
      });
    }
  }

  private async findGatewayService(
    controlPlaneId: string,
    name: string,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const client = this.options.client;
    if (!client) {
      throw new ReferenceResolutionError('a state client is required to resolve gateway services');
    }
    const services = await client.listGatewayServices(controlPlaneId, signal ? { signal } : {});
    const matches = services.filter((service) => service.name === name);
    if (matches.length > 1) {
      throw new ReferenceResolutionError(`gateway_service selector matched multiple services for name "${name}"`);
    }
    const match = matches[0];
    if (!match) {
      throw new ReferenceResolutionError(
        `gateway_service not found with name "${name}" in control plane ${controlPlaneId}`,
      );
    }
    return match.id;
  }
}

function withStepContext<T>(gatewayRef: string, parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ValidationError(`gateway_sync ${gatewayRef}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

export function createGatewaySyncHandler(options: GatewaySyncOptions = {}): ChangeHandler {
  const step = new GatewaySyncStep(options);
  return (change, context) => step.run(change, context);
}
