import type { RequestOptions, StateClient } from '../client/types.js';
import type { ExecutionContext } from '../contracts.js';
import { ValidationError } from '../errors.js';
import { buildCreateLabels, buildUpdateLabels, extractLabels } from '../labels/labels.js';
import type { LabelMap, LabelUpdate } from '../labels/labels.js';

export function requireClient(client: StateClient | undefined, resourceType: string): StateClient {
  if (!client) {
    throw new ValidationError(`no state client configured for ${resourceType} operations`);
  }
  return client;
}

export function requestOptions(execContext: ExecutionContext): RequestOptions {
  return execContext.signal ? { signal: execContext.signal } : {};
}

export function createLabels(fields: Record<string, unknown>, execContext: ExecutionContext): LabelMap {
  return buildCreateLabels(extractLabels(fields.labels), execContext.namespace, execContext.protection);
}

/**
 * A change without a `labels` field keeps the resource's current user
 * labels; the bookkeeping keys are rewritten either way.
 */
export function updateLabels(
  fields: Record<string, unknown>,
  currentLabels: LabelMap,
  execContext: ExecutionContext,
): LabelUpdate {
  const desired = 'labels' in fields ? extractLabels(fields.labels) : currentLabels;
  return buildUpdateLabels(desired, currentLabels, execContext.namespace, execContext.protection);
}

export function requireReference(execContext: ExecutionContext, key: string, resourceType: string): string {
  const id = execContext.references[key];
  if (!id) {
    throw new ValidationError(`${resourceType} requires a resolved ${key}`);
  }
  return id;
}
