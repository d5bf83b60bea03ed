import { UNKNOWN_ID, parseRefPlaceholder } from '@resctl/plan-operations';
import type { PlannedChange, ReferenceInfo } from '@resctl/plan-operations';
import { validate as isUuid } from 'uuid';

import { changeDisplayName } from '../adapters/fields.js';
import { ApplyError, ReferenceResolutionError, toError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export interface ReferenceLookup {
  /** Returns the id of the named resource, or undefined when none exists. */
  lookupId(resourceType: string, name: string, options?: { signal?: AbortSignal }): Promise<string | undefined>;
}

export interface ReferenceRequest {
  /** Type of the resource being referred to. */
  resourceType: string;
  /** Key in `change.references`. */
  referenceKey?: string;
  /** Field that may carry a literal id or a ref placeholder. */
  field?: string;
  /** Whether `change.parent` points at the wanted resource. */
  fromParent?: boolean;
}

/**
 * `(resourceType, ref) -> id` entries recorded during one execution.
 */
export class ReferenceTable {
  private readonly entries = new Map<string, string>();

  record(resourceType: string, ref: string, id: string): void {
    this.entries.set(tableKey(resourceType, ref), id);
  }

  get(resourceType: string, ref: string): string | undefined {
    return this.entries.get(tableKey(resourceType, ref));
  }

  get size(): number {
    return this.entries.size;
  }
}

function tableKey(resourceType: string, ref: string): string {
  return `${resourceType}\u0000${ref}`;
}

function isKnownId(id: string | undefined): id is string {
  return id !== undefined && id !== '' && id !== UNKNOWN_ID;
}

export interface ReferenceResolverOptions {
  lookup?: ReferenceLookup;
  logger: Logger;
}

export class ReferenceResolver {
  readonly table = new ReferenceTable();

  constructor(private readonly options: ReferenceResolverOptions) {}

  record(resourceType: string, ref: string, id: string): void {
    this.table.record(resourceType, ref, id);
    this.options.logger.debug('Recorded reference', { resourceType, ref, id });
  }

  get(resourceType: string, ref: string): string | undefined {
    return this.table.get(resourceType, ref);
  }

  /**
   * Resolves in order: the change's reference entry (resolved id, then the
   * table), the parent pointer, a literal UUID or placeholder in `field`, and
   * finally a lookup by name.
   */
  async resolve(change: PlannedChange, request: ReferenceRequest, signal?: AbortSignal): Promise<string> {
    const id = await this.tryResolve(change, request, signal);
    if (id === undefined) {
      throw new ReferenceResolutionError(
        `${change.resourceType} '${changeDisplayName(change)}' has no ${request.resourceType} reference`,
        { context: { changeId: change.id, resourceType: request.resourceType } },
      );
    }
    return id;
  }

  /** Like `resolve`, but returns undefined when nothing names the reference. */
  async tryResolve(
    change: PlannedChange,
    request: ReferenceRequest,
    signal?: AbortSignal,
  ): Promise<string | undefined> {
    const { resourceType } = request;
    const reference: ReferenceInfo | undefined =
      request.referenceKey !== undefined ? change.references?.[request.referenceKey] : undefined;
    const parent = request.fromParent ? change.parent : undefined;
    const fieldValue = request.field !== undefined ? change.fields[request.field] : undefined;
    const placeholder = parseRefPlaceholder(fieldValue);

    if (reference) {
      if (isKnownId(reference.id)) {
        return reference.id;
      }
      const recorded = this.table.get(resourceType, reference.ref);
      if (recorded !== undefined) {
        return recorded;
      }
    }

    if (parent) {
      if (isKnownId(parent.id)) {
        return parent.id;
      }
      const recorded = this.table.get(resourceType, parent.ref);
      if (recorded !== undefined) {
        return recorded;
      }
    }

    if (placeholder) {
      const recorded = this.table.get(resourceType, placeholder.ref);
      if (recorded !== undefined) {
        return recorded;
      }
    } else if (typeof fieldValue === 'string' && isUuid(fieldValue)) {
      return fieldValue;
    }

    const name =
      reference?.lookupFields?.name ??
      reference?.ref ??
      parent?.ref ??
      placeholder?.ref ??
      (typeof fieldValue === 'string' && fieldValue !== '' ? fieldValue : undefined);

    if (name === undefined || name === UNKNOWN_ID) {
      return undefined;
    }

    const recordedByName = this.table.get(resourceType, name);
    if (recordedByName !== undefined) {
      return recordedByName;
    }

    const id = await this.lookupByName(change, resourceType, name, signal);
    this.record(resourceType, reference?.ref ?? parent?.ref ?? placeholder?.ref ?? name, id);
    return id;
  }

  private async lookupByName(
    change: PlannedChange,
    resourceType: string,
    name: string,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    const subject = `${resourceType} reference '${name}' for ${change.resourceType} '${changeDisplayName(change)}'`;
    const lookup = this.options.lookup;
    if (!lookup) {
      throw new ReferenceResolutionError(`cannot resolve ${subject}: no state client configured`);
    }

    let id: string | undefined;
    try {
      id = await lookup.lookupId(resourceType, name, { signal });
    } catch (error) {
      if (error instanceof ApplyError) {
        throw error;
      }
      const err = toError(error);
      throw new ReferenceResolutionError(`failed to resolve ${subject}: ${err.message}`, { cause: err });
    }

    if (id === undefined) {
      throw new ReferenceResolutionError(`failed to resolve ${subject}: not found`);
    }
    this.options.logger.debug('Resolved reference by name', { resourceType, name, id });
    return id;
  }
}
