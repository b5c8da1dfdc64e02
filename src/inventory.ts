// Inventory Run - Collect, export and upload in one pass
import { InventoryCollector } from './collector.js';
import { defaultOutputPath } from './config.js';
import { IssueCollector } from './errors.js';
import { ExcelExporter } from './exporters/excel.js';
import { resolveKinds } from './resource-kinds.js';
import { uploadInventory } from './uploader.js';
import type {
  ExportSummary,
  InventoryConfig,
  ObjectUploader,
  ResourceSource,
  UploadResult,
} from './types.js';

/**
 * Collaborators of a run
 */
export interface InventoryDependencies {
  source: ResourceSource;
  uploader: ObjectUploader;
  exporter?: ExcelExporter;
  /** Clock used for the default output name */
  now?: () => Date;
}

/**
 * What a completed run produced
 */
export interface InventoryRunSummary {
  outputPath: string;
  export: ExportSummary;
  upload: UploadResult;
  issues: IssueCollector;
}

/**
 * Run one inventory: collect every project, write the workbook, upload it.
 *
 * Rejects when the configuration names unknown kinds, when an asset search
 * fails, or when the workbook cannot be written. Per-kind, per-sheet and
 * upload failures end up in the summary instead.
 */
export async function runInventory(
  config: InventoryConfig,
  deps: InventoryDependencies
): Promise<InventoryRunSummary> {
  const now = deps.now ?? (() => new Date());
  const exporter = deps.exporter ?? new ExcelExporter();
  const issues = new IssueCollector();
  const collector = new InventoryCollector(deps.source, issues);

  const kinds = config.mode === 'per-kind' ? resolveKinds(config.kinds) : undefined;
  const resources = await collector.collect(config.projects, config.mode, kinds);

  const outputPath = config.output || defaultOutputPath(config.projects[0], now());
  const exported = await exporter.export(resources, { outputPath });
  for (const failure of exported.failures) {
    issues.addError(failure.label, 'export', failure.error);
  }

  const upload = await uploadInventory(deps.uploader, outputPath, config.bucket, config.destination);
  if (upload.status === 'failed') {
    issues.addError(upload.uri, 'upload', upload.error);
  }

  return { outputPath, export: exported, upload, issues };
}

/**
 * Format a run summary for the console.
 */
export function formatRunSummary(summary: InventoryRunSummary): string {
  const lines = [`Inventory written to: ${summary.outputPath}`];

  if (summary.export.placeholder) {
    lines.push('  No resources collected; wrote a placeholder sheet.');
  }
  for (const sheet of summary.export.sheets) {
    lines.push(`  ${sheet.sheetName} (${sheet.label}): ${sheet.rows} rows, ${sheet.columns} columns`);
  }

  switch (summary.upload.status) {
    case 'uploaded':
      lines.push(`Uploaded to: ${summary.upload.uri}`);
      break;
    case 'failed':
      lines.push(`Upload to ${summary.upload.uri} failed: ${summary.upload.error.message}`);
      break;
    case 'skipped':
      lines.push(`Upload skipped: ${summary.upload.reason}`);
      break;
  }

  lines.push('', summary.issues.formatSummary());
  return lines.join('\n');
}
