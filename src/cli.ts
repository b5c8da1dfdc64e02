#!/usr/bin/env node
// CLI Interface for the GCP inventory exporter
import { Command } from 'commander';
import { ConfigManager, ConfigValidationError, resolveConfig, type CollectOptions } from './config.js';
import { CollectionError } from './errors.js';
import { createBackend } from './gcp/index.js';
import { formatRunSummary, runInventory } from './inventory.js';
import { RESOURCE_KINDS } from './resource-kinds.js';
import type { InventoryConfig } from './types.js';

interface ConfigSaveOptions extends Omit<CollectOptions, 'output'> {
  output: string;
  workbook?: string;
}

const program = new Command();

program
  .name('gcp-inventory')
  .description('Collect Google Cloud resources into an Excel workbook and upload it to Cloud Storage')
  .version('1.0.0');

// Collect command - main functionality
program
  .command('collect')
  .description('Collect resources for one or more projects and write the workbook')
  .option('-p, --project <ids>', 'GCP project id (or comma separated list); defaults to GOOGLE_CLOUD_PROJECT')
  .option('-b, --bucket <name>', 'GCS bucket to upload the workbook to; defaults to INVENTORY_BUCKET')
  .option('-o, --output <path>', 'Local workbook path (default gcp-inventory-<project>-<timestamp>.xlsx)')
  .option('-d, --destination <object>', 'Object name inside the bucket (default: workbook file name)')
  .option('--use-asset', 'Use a Cloud Asset search instead of per-kind listings', false)
  .option('--backend <backend>', 'Client for the Google Cloud calls: api or gcloud', 'api')
  .option('--kinds <list>', 'Comma separated resource kinds for per-kind mode (default: all)')
  .action(async (options: CollectOptions) => {
    await runCollect(() => resolveConfig(options));
  });

// Config command group
const configCmd = program
  .command('config')
  .description('Manage saved inventory configurations');

configCmd
  .command('save')
  .description('Save a configuration to a file')
  .requiredOption('-o, --output <path>', 'Output config file path')
  .option('-p, --project <ids>', 'GCP project id (or comma separated list); defaults to GOOGLE_CLOUD_PROJECT')
  .option('-b, --bucket <name>', 'GCS bucket to upload the workbook to')
  .option('--workbook <path>', 'Local workbook path')
  .option('-d, --destination <object>', 'Object name inside the bucket')
  .option('--use-asset', 'Use a Cloud Asset search instead of per-kind listings', false)
  .option('--backend <backend>', 'Client for the Google Cloud calls: api or gcloud', 'api')
  .option('--kinds <list>', 'Comma separated resource kinds for per-kind mode')
  .action(async (options: ConfigSaveOptions) => {
    await runConfigSave(options);
  });

configCmd
  .command('load')
  .description('Load a configuration file and run the inventory')
  .requiredOption('-c, --config <path>', 'Config file path to load')
  .action(async (options: { config: string }) => {
    await runCollect(() => new ConfigManager().load(options.config));
  });

// Kinds command - list what per-kind mode collects
program
  .command('kinds')
  .description('List the resource kinds collected in per-kind mode')
  .action(() => {
    for (const kind of RESOURCE_KINDS) {
      const service = kind.requiredService ? ` (requires ${kind.requiredService})` : '';
      console.log(`${kind.name.padEnd(20)} ${kind.description}${service}`);
    }
  });

/**
 * Report an error and exit. Configuration problems exit with 2, everything else with 1.
 */
function exitWithError(error: unknown): never {
  if (error instanceof ConfigValidationError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(2);
  }
  if (error instanceof CollectionError) {
    console.error(`\nCollection failed for ${error.project}: ${error.message}`);
    process.exit(1);
  }
  console.error(`\nError: ${error instanceof Error ? error.message : 'Unknown error'}`);
  process.exit(1);
}

/**
 * Resolve the configuration, then run collection, export and upload.
 */
async function runCollect(loadConfig: () => InventoryConfig | Promise<InventoryConfig>): Promise<void> {
  console.log('GCP Inventory');
  console.log('=============\n');

  let config: InventoryConfig;
  try {
    config = await loadConfig();
  } catch (error) {
    exitWithError(error);
  }

  console.log(`Projects: ${config.projects.join(', ')}`);
  console.log(`Mode: ${config.mode} (${config.backend} backend)\n`);

  try {
    const backend = createBackend(config.backend);
    const summary = await runInventory(config, { source: backend, uploader: backend });
    console.log('\n' + formatRunSummary(summary));
  } catch (error) {
    exitWithError(error);
  }
}

/**
 * Run the config save command
 */
async function runConfigSave(options: ConfigSaveOptions): Promise<void> {
  const configManager = new ConfigManager();

  try {
    const config = resolveConfig({ ...options, output: options.workbook });
    await configManager.save(config, options.output);
    console.log(`Configuration saved to: ${options.output}`);
  } catch (error) {
    exitWithError(error);
  }
}

await program.parseAsync(process.argv);
