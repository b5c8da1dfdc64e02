// Resource kinds listed in per-kind mode
import { ConfigValidationError } from './config.js';
import type { ResourceKind } from './types.js';

/**
 * Kinds in the order their sheets appear in the workbook.
 * A kind with `requiredService` is only listed when that service is enabled.
 */
export const RESOURCE_KINDS: readonly ResourceKind[] = [
  {
    name: 'compute_instances',
    description: 'Compute Engine VM instances (all zones)',
  },
  {
    name: 'gke_clusters',
    description: 'Google Kubernetes Engine clusters',
    requiredService: 'container.googleapis.com',
  },
  {
    name: 'cloud_functions',
    description: 'Cloud Functions (1st and 2nd gen)',
    requiredService: 'cloudfunctions.googleapis.com',
  },
  {
    name: 'sql_instances',
    description: 'Cloud SQL instances',
    requiredService: 'sqladmin.googleapis.com',
  },
  {
    name: 'storage_buckets',
    description: 'Cloud Storage buckets',
  },
];

/** Label suffix used for the single asset-mode collection of a project */
export const ASSET_RESOURCES = 'asset_resources';

/**
 * Select resource kinds by name, keeping the canonical order.
 * No names (or an empty list) selects every kind.
 */
export function resolveKinds(names?: string[]): ResourceKind[] {
  if (!names || names.length === 0) {
    return [...RESOURCE_KINDS];
  }

  const known = new Set(RESOURCE_KINDS.map(kind => kind.name));
  const unknown = names.filter(name => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigValidationError(
      `Unknown resource kind(s): ${unknown.join(', ')}. Known kinds: ${Array.from(known).join(', ')}`
    );
  }

  const wanted = new Set(names);
  return RESOURCE_KINDS.filter(kind => wanted.has(kind.name));
}

/**
 * Build the ResourceSet label for a project and kind.
 */
export function resourceLabel(project: string, kind: string): string {
  return `${project}::${kind}`;
}
