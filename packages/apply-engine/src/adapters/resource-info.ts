import type { ResourceInfo } from '../contracts.js';
import { normalizeLabels } from '../labels/labels.js';
import type { ApiLabels } from '../client/types.js';

export function toResourceInfo(resource: { id: string; name: string; labels: ApiLabels }): ResourceInfo {
  const normalizedLabels = normalizeLabels(resource.labels);
  return {
    id: resource.id,
    name: resource.name,
    labels: { ...normalizedLabels },
    normalizedLabels,
  };
}
