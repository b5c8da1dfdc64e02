// Inventory Collector - Gathers resource records for one or more projects
import { CollectionError, IssueCollector, toError } from './errors.js';
import { ErrorClassifier } from './error-classifier.js';
import { ASSET_RESOURCES, resolveKinds, resourceLabel } from './resource-kinds.js';
import type {
  CollectionMode,
  InventoryRecord,
  ResourceKind,
  ResourceSet,
  ResourceSource,
} from './types.js';

/**
 * InventoryCollector drives a ResourceSource.
 *
 * Asset mode issues one search per project and fails the run if it fails.
 * Per-kind mode lists each kind on its own: a kind that fails or whose
 * service is disabled yields an empty list and an issue, and the other
 * kinds are still collected.
 */
export class InventoryCollector {
  private readonly classifier = new ErrorClassifier();

  constructor(
    private readonly source: ResourceSource,
    private readonly issues: IssueCollector
  ) {}

  /**
   * Search every resource in a project.
   * Throws CollectionError on failure.
   */
  async collectAssets(project: string): Promise<InventoryRecord[]> {
    console.log(`[InventoryCollector] Collecting Cloud Asset resources for ${project}...`);
    let resources: InventoryRecord[];
    try {
      resources = await this.source.searchAllResources(project);
    } catch (error) {
      const err = toError(error);
      console.error(`[InventoryCollector] Cloud Asset search failed for ${project}: ${this.classifier.describe(err)}`);
      throw new CollectionError(project, ASSET_RESOURCES, `Cloud Asset search failed for ${project}: ${err.message}`, {
        cause: err,
      });
    }
    console.log(`[InventoryCollector] Collected ${resources.length} resources from Cloud Asset`);
    return resources;
  }

  /**
   * List each resource kind of a project. Never throws for a single kind.
   *
   * @param kinds - Kinds to list (default: all known kinds)
   * @returns Records per kind name, in the order of `kinds`
   */
  async collectKinds(project: string, kinds: ResourceKind[] = resolveKinds()): Promise<Map<string, InventoryRecord[]>> {
    const collected = new Map<string, InventoryRecord[]>();

    for (const kind of kinds) {
      collected.set(kind.name, await this.collectKind(project, kind));
    }

    return collected;
  }

  /**
   * Collect every project in order and label the results `<project>::<kind>`.
   */
  async collect(projects: string[], mode: CollectionMode, kinds?: ResourceKind[]): Promise<ResourceSet> {
    const resources: ResourceSet = new Map();

    for (const project of projects) {
      console.log(`[InventoryCollector] Gathering resources for project: ${project}`);
      if (mode === 'asset') {
        resources.set(resourceLabel(project, ASSET_RESOURCES), await this.collectAssets(project));
        continue;
      }

      const byKind = await this.collectKinds(project, kinds);
      for (const [kind, records] of byKind) {
        resources.set(resourceLabel(project, kind), records);
      }
    }

    return resources;
  }

  private async collectKind(project: string, kind: ResourceKind): Promise<InventoryRecord[]> {
    const subject = resourceLabel(project, kind.name);

    if (kind.requiredService && !(await this.serviceEnabled(project, kind.requiredService))) {
      const message = `${kind.requiredService} is not enabled for project ${project}; skipping ${kind.name} listing.`;
      console.log(`[InventoryCollector] ${message}`);
      this.issues.addSkip(subject, 'collect', message);
      return [];
    }

    try {
      const records = await this.source.listResources(project, kind);
      console.log(`[InventoryCollector] ${subject}: ${records.length} resources`);
      return records;
    } catch (error) {
      const err = toError(error);
      console.error(`[InventoryCollector] Failed to list ${kind.name} for ${project}: ${this.classifier.describe(err)}`);
      this.issues.addError(subject, 'collect', err);
      return [];
    }
  }

  // A failed check counts as disabled
  private async serviceEnabled(project: string, service: string): Promise<boolean> {
    try {
      return await this.source.isServiceEnabled(project, service);
    } catch (error) {
      const err = toError(error);
      console.warn(`[InventoryCollector] Could not check ${service} for ${project}: ${this.classifier.describe(err)}`);
      return false;
    }
  }
}
