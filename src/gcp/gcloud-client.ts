/**
 * gcloud CLI client
 *
 * Collects resources and uploads the workbook by running `gcloud` with
 * `--format=json`. Uses whatever account gcloud is logged in with.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { CollectionError } from '../errors.js';
import { isJsonObject, toRecords } from '../records.js';
import { ASSET_RESOURCES } from '../resource-kinds.js';
import type { InventoryRecord, JsonValue, ObjectUploader, ResourceKind, ResourceSource } from '../types.js';

/**
 * Runs gcloud with the given arguments and resolves with its stdout.
 * Rejects when the command exits non-zero.
 */
export type CommandRunner = (args: string[]) => Promise<string>;

const execFileAsync = promisify(execFile);

// Asset searches over large projects print a lot of JSON
const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

export const runGcloud: CommandRunner = async args => {
  const { stdout } = await execFileAsync('gcloud', args, { maxBuffer: MAX_OUTPUT_BYTES });
  return stdout;
};

/** gcloud command groups listing each resource kind */
export const KIND_COMMANDS: Readonly<Record<string, readonly string[]>> = {
  compute_instances: ['compute', 'instances', 'list'],
  gke_clusters: ['container', 'clusters', 'list'],
  cloud_functions: ['functions', 'list'],
  sql_instances: ['sql', 'instances', 'list'],
  storage_buckets: ['storage', 'buckets', 'list'],
};

/**
 * Whether an entry of `gcloud services list` describes the given service.
 * Entries carry the service as `name` (possibly `projects/N/services/<svc>`),
 * `serviceName` or `config.name` depending on the gcloud version.
 */
export function matchesService(entry: JsonValue, service: string): boolean {
  if (!isJsonObject(entry)) {
    return false;
  }
  const { name, serviceName, config } = entry;
  if (name === service || serviceName === service) {
    return true;
  }
  if (typeof name === 'string' && name.endsWith(`/services/${service}`)) {
    return true;
  }
  return isJsonObject(config) && config.name === service;
}

export class GcloudClient implements ResourceSource, ObjectUploader {
  // `services list --enabled` output per project
  private readonly enabledServices = new Map<string, string>();

  constructor(private readonly run: CommandRunner = runGcloud) {}

  async searchAllResources(project: string): Promise<InventoryRecord[]> {
    const output = await this.run([
      'asset',
      'search-all-resources',
      `--scope=projects/${project}`,
      `--project=${project}`,
      '--format=json',
    ]);
    return this.parseRecords(output, project, ASSET_RESOURCES);
  }

  async listResources(project: string, kind: ResourceKind): Promise<InventoryRecord[]> {
    const command = KIND_COMMANDS[kind.name];
    if (!command) {
      throw new Error(`Unsupported resource kind: ${kind.name}`);
    }
    const output = await this.run([...command, `--project=${project}`, '--format=json']);
    return this.parseRecords(output, project, kind.name);
  }

  async isServiceEnabled(project: string, service: string): Promise<boolean> {
    const output = await this.listEnabledServices(project);

    let services: unknown;
    try {
      services = JSON.parse(output);
    } catch {
      // Not JSON: fall back to looking for the name anywhere in the output
      return output.includes(service);
    }

    return toRecords(services).some(entry => matchesService(entry, service));
  }

  async upload(localFile: string, bucket: string, destination: string): Promise<void> {
    await this.run(['storage', 'cp', localFile, `gs://${bucket}/${destination}`]);
  }

  private async listEnabledServices(project: string): Promise<string> {
    const cached = this.enabledServices.get(project);
    if (cached !== undefined) {
      return cached;
    }
    const output = await this.run(['services', 'list', `--project=${project}`, '--enabled', '--format=json']);
    this.enabledServices.set(project, output);
    return output;
  }

  private parseRecords(output: string, project: string, kind: string): InventoryRecord[] {
    if (output.trim() === '') {
      return [];
    }
    try {
      return toRecords(JSON.parse(output));
    } catch (error) {
      throw new CollectionError(project, kind, `gcloud returned invalid JSON for ${kind} in ${project}`, {
        cause: error,
      });
    }
  }
}
