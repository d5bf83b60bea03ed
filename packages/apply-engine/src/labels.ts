export {
  FALSE_VALUE,
  LABEL_PREFIX,
  LAST_UPDATED_KEY,
  MANAGED_KEY,
  NAMESPACE_KEY,
  PROTECTED_KEY,
  TRUE_VALUE,
  buildCreateLabels,
  buildUpdateLabels,
  extractLabels,
  formatLastUpdated,
  getUserLabels,
  isManagedResource,
  isReservedLabel,
  normalizeLabels,
  toLabelMap,
  validateLabelKey,
} from './labels/labels.js';
export type { LabelMap, LabelUpdate, RawLabels } from './labels/labels.js';
export {
  isProtected,
  isProtectionChange,
  protectionValue,
  validateResourceProtection,
} from './labels/protection.js';
