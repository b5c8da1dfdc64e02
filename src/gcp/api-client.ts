/**
 * Google Cloud REST client
 *
 * Implements resource collection and workbook upload on top of the
 * `googleapis` discovery clients:
 * - Cloud Asset v1 searchAllResources (asset mode)
 * - Compute, GKE, Cloud Functions, Cloud SQL and Storage listings (per-kind mode)
 * - Service Usage for the enabled-service check
 * - Storage objects.insert for the upload
 */

import { createReadStream } from 'fs';
import { google } from 'googleapis';
import { toRecords } from '../records.js';
import type { InventoryRecord, ObjectUploader, ResourceKind, ResourceSource } from '../types.js';
import { getAuth, type GoogleAuthClient } from './auth.js';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/**
 * One page of a listing call.
 */
export interface ResultPage {
  items: unknown;
  nextPageToken?: string | null;
}

/**
 * Fetch pages until the service stops returning a page token.
 */
export async function collectPages(
  fetchPage: (pageToken: string | undefined) => Promise<ResultPage>
): Promise<InventoryRecord[]> {
  const records: InventoryRecord[] = [];
  let pageToken: string | undefined;

  do {
    const page = await fetchPage(pageToken);
    records.push(...toRecords(page.items));
    pageToken = page.nextPageToken || undefined;
  } while (pageToken);

  return records;
}

export class GoogleApisClient implements ResourceSource, ObjectUploader {
  constructor(private readonly auth: GoogleAuthClient = getAuth()) {}

  async searchAllResources(project: string): Promise<InventoryRecord[]> {
    const asset = google.cloudasset({ version: 'v1', auth: this.auth });
    const scope = `projects/${project}`;

    return collectPages(async pageToken => {
      const { data } = await asset.v1.searchAllResources({ scope, pageToken });
      return { items: data.results, nextPageToken: data.nextPageToken };
    });
  }

  async listResources(project: string, kind: ResourceKind): Promise<InventoryRecord[]> {
    switch (kind.name) {
      case 'compute_instances':
        return this.listComputeInstances(project);
      case 'gke_clusters':
        return this.listClusters(project);
      case 'cloud_functions':
        return this.listFunctions(project);
      case 'sql_instances':
        return this.listSqlInstances(project);
      case 'storage_buckets':
        return this.listBuckets(project);
      default:
        throw new Error(`Unsupported resource kind: ${kind.name}`);
    }
  }

  async isServiceEnabled(project: string, service: string): Promise<boolean> {
    const serviceUsage = google.serviceusage({ version: 'v1', auth: this.auth });
    const { data } = await serviceUsage.services.get({ name: `projects/${project}/services/${service}` });
    return data.state === 'ENABLED';
  }

  async upload(localFile: string, bucket: string, destination: string): Promise<void> {
    const storage = google.storage({ version: 'v1', auth: this.auth });
    await storage.objects.insert({
      bucket,
      name: destination,
      media: {
        mimeType: XLSX_MIME_TYPE,
        body: createReadStream(localFile),
      },
    });
  }

  // Aggregated listing covers every zone in one call sequence
  private async listComputeInstances(project: string): Promise<InventoryRecord[]> {
    const compute = google.compute({ version: 'v1', auth: this.auth });

    return collectPages(async pageToken => {
      const { data } = await compute.instances.aggregatedList({ project, pageToken });
      const instances = data.items ? Object.values(data.items).flatMap(scoped => scoped.instances ?? []) : [];
      return { items: instances, nextPageToken: data.nextPageToken };
    });
  }

  private async listClusters(project: string): Promise<InventoryRecord[]> {
    const container = google.container({ version: 'v1', auth: this.auth });
    const { data } = await container.projects.locations.clusters.list({
      parent: `projects/${project}/locations/-`,
    });
    return toRecords(data.clusters);
  }

  private async listFunctions(project: string): Promise<InventoryRecord[]> {
    const functions = google.cloudfunctions({ version: 'v2', auth: this.auth });
    const parent = `projects/${project}/locations/-`;

    return collectPages(async pageToken => {
      const { data } = await functions.projects.locations.functions.list({ parent, pageToken });
      return { items: data.functions, nextPageToken: data.nextPageToken };
    });
  }

  private async listSqlInstances(project: string): Promise<InventoryRecord[]> {
    const sql = google.sqladmin({ version: 'v1beta4', auth: this.auth });

    return collectPages(async pageToken => {
      const { data } = await sql.instances.list({ project, pageToken });
      return { items: data.items, nextPageToken: data.nextPageToken };
    });
  }

  private async listBuckets(project: string): Promise<InventoryRecord[]> {
    const storage = google.storage({ version: 'v1', auth: this.auth });

    return collectPages(async pageToken => {
      const { data } = await storage.buckets.list({ project, pageToken });
      return { items: data.items, nextPageToken: data.nextPageToken };
    });
  }
}
