/**
 * Serialized `!ref` placeholders. A field value of `__REF__:<ref>#<field>`
 * stands for `<field>` of the resource declared as `<ref>`, known only once
 * that resource exists.
 */
export const REF_PLACEHOLDER_PREFIX = '__REF__:';

export interface ParsedRefPlaceholder {
  ref: string;
  field: string;
}

export function isRefPlaceholder(value: unknown): value is string {
  return typeof value === 'string' && value.startsWith(REF_PLACEHOLDER_PREFIX);
}

export function parseRefPlaceholder(value: unknown): ParsedRefPlaceholder | undefined {
  if (!isRefPlaceholder(value)) {
    return undefined;
  }

  const body = value.slice(REF_PLACEHOLDER_PREFIX.length);
  const hashIndex = body.indexOf('#');
  const ref = hashIndex === -1 ? body : body.slice(0, hashIndex);
  const field = hashIndex === -1 ? 'id' : body.slice(hashIndex + 1);

  if (!ref || !field) {
    return undefined;
  }
  return { ref, field };
}

export function formatRefPlaceholder(ref: string, field = 'id'): string {
  return `${REF_PLACEHOLDER_PREFIX}${ref}#${field}`;
}
