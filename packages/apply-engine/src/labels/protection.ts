import type { PlannedChange, Protection, ProtectionChange } from '@resctl/plan-operations';

import { ProtectionViolationError, actionToVerb } from '../errors.js';
import { PROTECTED_KEY, TRUE_VALUE, type LabelMap } from './labels.js';

export function isProtected(normalizedLabels: LabelMap | undefined): boolean {
  return normalizedLabels?.[PROTECTED_KEY] === TRUE_VALUE;
}

/** True only for a `{ old, new }` pair that actually flips the flag. */
export function isProtectionChange(
  protection: Protection | undefined,
): protection is ProtectionChange {
  return typeof protection === 'object' && protection !== null && protection.old !== protection.new;
}

export function protectionValue(protection: Protection | undefined): boolean {
  if (protection === undefined) {
    return false;
  }
  return typeof protection === 'boolean' ? protection : protection.new;
}

export function validateResourceProtection(
  resourceType: string,
  resourceName: string,
  resourceIsProtected: boolean,
  change: Pick<PlannedChange, 'action'>,
  protectionChanging: boolean,
): void {
  if (
    resourceIsProtected &&
    !protectionChanging &&
    (change.action === 'UPDATE' || change.action === 'DELETE')
  ) {
    throw new ProtectionViolationError(
      `resource '${resourceName}' (${resourceType}) is protected and cannot be ${actionToVerb(change.action)}`,
      { context: { resourceType, resourceName, action: change.action } },
    );
  }
}
