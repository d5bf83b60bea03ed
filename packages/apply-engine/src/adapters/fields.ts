import { UNKNOWN_ID, type PlannedChange } from '@resctl/plan-operations';

import { ValidationError } from '../errors.js';

export function mapOptionalString(fields: Record<string, unknown>, key: string): string | undefined {
  const value = fields[key];
  return typeof value === 'string' ? value : undefined;
}

export function mapOptionalBool(fields: Record<string, unknown>, key: string): boolean | undefined {
  const value = fields[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function mapOptionalStringArray(fields: Record<string, unknown>, key: string): string[] | undefined {
  const value = fields[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function mapOptionalRecord(
  fields: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined {
  const value = fields[key];
  return isRecord(value) ? value : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function extractResourceName(fields: Record<string, unknown>): string {
  const name = fields.name;
  return typeof name === 'string' ? name : UNKNOWN_ID;
}

/** Throws when a required field is absent or an empty string. */
export function validateRequiredFields(
  resourceType: string,
  fields: Record<string, unknown>,
  required: readonly string[],
): void {
  for (const field of required) {
    if (!(field in fields) || fields[field] === undefined || fields[field] === null) {
      throw new ValidationError(`${resourceType}: required field '${field}' is missing`, {
        context: { resourceType, field },
      });
    }
    if (fields[field] === '') {
      throw new ValidationError(`${resourceType}: required field '${field}' cannot be empty`, {
        context: { resourceType, field },
      });
    }
  }
}

/** Adds `value` under `key` only when it is defined. */
export function assignDefined<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Name used in errors and progress output: the config ref, else the `name`
 * field, else the planner's monikers.
 */
export function changeDisplayName(change: PlannedChange): string {
  if (change.resourceRef && change.resourceRef !== UNKNOWN_ID) {
    return change.resourceRef;
  }
  const name = extractResourceName(change.fields);
  if (name !== UNKNOWN_ID) {
    return name;
  }
  const monikers = Object.entries(change.resourceMonikers ?? {});
  if (monikers.length > 0) {
    return monikers.map(([key, value]) => `${key}=${value}`).join(', ');
  }
  return UNKNOWN_ID;
}
