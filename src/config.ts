import { readFile, writeFile } from 'fs/promises';
import type { BackendName, CollectionMode, InventoryConfig } from './types.js';

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export const COLLECTION_MODES: readonly CollectionMode[] = ['asset', 'per-kind'];
export const BACKENDS: readonly BackendName[] = ['api', 'gcloud'];

/**
 * Options as they arrive from the command line
 */
export interface CollectOptions {
  project?: string;
  bucket?: string;
  output?: string;
  destination?: string;
  useAsset?: boolean;
  backend?: string;
  kinds?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

function isCollectionMode(value: unknown): value is CollectionMode {
  return COLLECTION_MODES.some(mode => mode === value);
}

function isBackendName(value: unknown): value is BackendName {
  return BACKENDS.some(backend => backend === value);
}

/**
 * Split a comma separated list, dropping blanks.
 */
export function parseProjectList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Format a date as a compact UTC timestamp, e.g. 20240115T103000Z.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

/**
 * Default workbook path for a run.
 */
export function defaultOutputPath(project: string, now: Date): string {
  return `gcp-inventory-${project}-${formatTimestamp(now)}.xlsx`;
}

/**
 * Build a run configuration from command line options and environment.
 * The project falls back to GOOGLE_CLOUD_PROJECT and the bucket to INVENTORY_BUCKET.
 * Throws ConfigValidationError when no project is given.
 */
export function resolveConfig(options: CollectOptions, env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const projectValue = options.project || env.GOOGLE_CLOUD_PROJECT || '';
  const projects = parseProjectList(projectValue);
  if (projects.length === 0) {
    throw new ConfigValidationError('Project not provided via --project or GOOGLE_CLOUD_PROJECT environment variable');
  }

  const backend = options.backend ?? 'api';
  if (!isBackendName(backend)) {
    throw new ConfigValidationError(`Invalid backend "${backend}". Use ${BACKENDS.join(' or ')}.`);
  }

  const config: InventoryConfig = {
    projects,
    mode: options.useAsset ? 'asset' : 'per-kind',
    backend,
  };

  const kinds = options.kinds ? parseProjectList(options.kinds) : [];
  if (kinds.length > 0) {
    config.kinds = kinds;
  }
  if (options.output) {
    config.output = options.output;
  }
  const bucket = options.bucket || env.INVENTORY_BUCKET;
  if (bucket) {
    config.bucket = bucket;
  }
  if (options.destination) {
    config.destination = options.destination;
  }

  return config;
}

export class ConfigManager {
  /**
   * Validates if the given object is a valid InventoryConfig
   */
  validate(config: unknown): config is InventoryConfig {
    if (!isRecord(config)) {
      return false;
    }

    const { projects, mode, backend, kinds } = config;
    if (!Array.isArray(projects) || projects.length === 0) return false;
    if (!projects.every(project => typeof project === 'string' && project.length > 0)) return false;
    if (!isCollectionMode(mode)) return false;
    if (!isBackendName(backend)) return false;
    if (kinds !== undefined && (!Array.isArray(kinds) || !kinds.every(kind => typeof kind === 'string'))) return false;
    if (!isOptionalString(config.output)) return false;
    if (!isOptionalString(config.bucket)) return false;
    if (!isOptionalString(config.destination)) return false;

    return true;
  }

  /**
   * Serializes an InventoryConfig to JSON string
   */
  serialize(config: InventoryConfig): string {
    return JSON.stringify(config, null, 2);
  }

  /**
   * Deserializes a JSON string to InventoryConfig
   * Throws ConfigValidationError for invalid JSON or structure
   */
  deserialize(json: string): InventoryConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (e) {
      const message = e instanceof Error ? e.message : 'Unknown error';
      throw new ConfigValidationError(`Invalid JSON: ${message}`);
    }

    if (!this.validate(parsed)) {
      throw new ConfigValidationError('Invalid configuration structure: missing or invalid required fields');
    }

    return parsed;
  }

  /**
   * Saves an InventoryConfig to a JSON file
   */
  async save(config: InventoryConfig, path: string): Promise<void> {
    if (!this.validate(config)) {
      throw new ConfigValidationError('Cannot save invalid configuration');
    }
    await writeFile(path, this.serialize(config), 'utf-8');
  }

  /**
   * Loads an InventoryConfig from a JSON file
   */
  async load(path: string): Promise<InventoryConfig> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (e) {
      const message = e instanceof Error ? e.message : 'Unknown error';
      throw new ConfigValidationError(`Failed to read config file: ${message}`);
    }
    return this.deserialize(content);
  }
}
