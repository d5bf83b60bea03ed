import type { Protection } from '@resctl/plan-operations';

export const LABEL_PREFIX = 'RESCTL-';

export const NAMESPACE_KEY = `${LABEL_PREFIX}namespace`;
export const PROTECTED_KEY = `${LABEL_PREFIX}protected`;
export const MANAGED_KEY = `${LABEL_PREFIX}managed`;
export const LAST_UPDATED_KEY = `${LABEL_PREFIX}last-updated`;

export const TRUE_VALUE = 'true';
export const FALSE_VALUE = 'false';

const FORBIDDEN_USER_PREFIXES = ['kong', 'konnect', 'mesh', 'kic', '_'];

export type LabelMap = Record<string, string>;

/**
 * Label set sent with an update request. A `null` value asks the API to
 * remove the key.
 */
export type LabelUpdate = Record<string, string | null>;

/** Raw label map as returned by the API, where values may be null. */
export type RawLabels = Record<string, string | null | undefined> | null | undefined;

export function isReservedLabel(key: string): boolean {
  return key.startsWith(LABEL_PREFIX);
}

// Label maps are built from entries so that keys such as `__proto__` stay
// own data properties.
function isStringEntry(entry: [string, unknown]): entry is [string, string] {
  return typeof entry[1] === 'string';
}

export function getUserLabels(labels: LabelMap | undefined): LabelMap {
  return Object.fromEntries(Object.entries(labels ?? {}).filter(([key]) => !isReservedLabel(key)));
}

export function normalizeLabels(raw: RawLabels): LabelMap {
  return Object.fromEntries(Object.entries(raw ?? {}).filter(isStringEntry));
}

export function extractLabels(field: unknown): LabelMap {
  if (field === null || typeof field !== 'object' || Array.isArray(field)) {
    return {};
  }
  return Object.fromEntries(Object.entries(field).filter(isStringEntry));
}

function targetProtection(protection: Protection | undefined): string {
  if (protection === undefined) {
    return FALSE_VALUE;
  }
  const value = typeof protection === 'boolean' ? protection : protection.new;
  return value ? TRUE_VALUE : FALSE_VALUE;
}

function bookkeeping(namespace: string, protection: Protection | undefined): LabelMap {
  const labels: LabelMap = {
    [PROTECTED_KEY]: targetProtection(protection),
    [MANAGED_KEY]: TRUE_VALUE,
  };
  if (namespace) {
    labels[NAMESPACE_KEY] = namespace;
  }
  return labels;
}

export function buildCreateLabels(
  userLabels: LabelMap | undefined,
  namespace: string,
  protection: Protection | undefined,
): LabelMap {
  return { ...getUserLabels(userLabels), ...bookkeeping(namespace, protection) };
}

/**
 * Replacement semantics: the result holds every desired user label, a `null`
 * for each current user label that is no longer desired, and the
 * bookkeeping keys.
 */
export function buildUpdateLabels(
  desired: LabelMap | undefined,
  current: LabelMap | undefined,
  namespace: string,
  protection: Protection | undefined,
): LabelUpdate {
  const wanted = getUserLabels(desired);
  const removals = Object.keys(getUserLabels(current))
    .filter((key) => !Object.hasOwn(wanted, key))
    .map((key): [string, null] => [key, null]);
  return Object.fromEntries([
    ...Object.entries(wanted),
    ...removals,
    ...Object.entries(bookkeeping(namespace, protection)),
  ]);
}

/** The label map a resource ends up with once an update is applied. */
export function toLabelMap(update: LabelUpdate): LabelMap {
  return normalizeLabels(update);
}

export function isManagedResource(labels: LabelMap | undefined): boolean {
  if (!labels) {
    return false;
  }
  const namespace = labels[NAMESPACE_KEY];
  return (namespace !== undefined && namespace !== '') || labels[MANAGED_KEY] === TRUE_VALUE;
}

/**
 * Returns an error message for an invalid label key, or undefined when the
 * key is acceptable.
 */
export function validateLabelKey(key: string): string | undefined {
  if (key.length < 1 || key.length > 63) {
    return `label key must be 1-63 characters: ${key}`;
  }
  if (isReservedLabel(key)) {
    return undefined;
  }
  const forbidden = FORBIDDEN_USER_PREFIXES.find((prefix) => key.startsWith(prefix));
  if (forbidden !== undefined) {
    return `label key cannot start with ${forbidden}: ${key}`;
  }
  return undefined;
}

export function formatLastUpdated(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}
