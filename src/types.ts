// Core type definitions for the GCP inventory exporter

/**
 * Any value that can appear in a resource record.
 * Records come from loosely typed API payloads, so nothing here is schema-bound.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [field: string]: JsonValue;
}

/**
 * A single cloud resource as returned by a listing or search call.
 * Field sets vary by resource kind and by API version.
 */
export type InventoryRecord = JsonObject;

/**
 * Collected records keyed by category label (e.g. `my-project::gke_clusters`).
 * Iteration order is the order in which labels were collected.
 */
export type ResourceSet = Map<string, InventoryRecord[]>;

/**
 * How resources are gathered for a project
 * - asset: one Cloud Asset search over the whole project
 * - per-kind: one listing call per resource kind
 */
export type CollectionMode = 'asset' | 'per-kind';

/**
 * Which client performs the external calls
 */
export type BackendName = 'api' | 'gcloud';

/**
 * A per-kind resource category
 */
export interface ResourceKind {
  /** Label suffix and sheet base name (e.g. 'compute_instances') */
  name: string;
  /** Human-readable description for listings */
  description: string;
  /** Service that must be enabled before the kind can be listed */
  requiredService?: string;
}

/**
 * Source of resource records for a project.
 * Every call either resolves with records or rejects; callers decide whether
 * a rejection is fatal.
 */
export interface ResourceSource {
  /** Search every resource visible under `projects/<project>` */
  searchAllResources(project: string): Promise<InventoryRecord[]>;
  /** List the resources of one kind */
  listResources(project: string, kind: ResourceKind): Promise<InventoryRecord[]>;
  /** Whether a service (e.g. container.googleapis.com) is enabled for the project */
  isServiceEnabled(project: string, service: string): Promise<boolean>;
}

/**
 * Stores a local file as an object inside a bucket
 */
export interface ObjectUploader {
  upload(localFile: string, bucket: string, destination: string): Promise<void>;
}

/**
 * Inventory run configuration
 */
export interface InventoryConfig {
  /** Project IDs, processed in order */
  projects: string[];
  /** Collection mode for every project of the run */
  mode: CollectionMode;
  /** Client used for the external calls */
  backend: BackendName;
  /** Subset of resource kind names for per-kind mode (default: all) */
  kinds?: string[];
  /** Local workbook path (default: derived from first project and UTC time) */
  output?: string;
  /** Bucket to upload the workbook to; upload is skipped when absent */
  bucket?: string;
  /** Object name inside the bucket (default: the workbook's base name) */
  destination?: string;
}

/**
 * Stage of a run in which an issue was recorded
 */
export type IssueStage = 'collect' | 'export' | 'upload';

/**
 * A non-fatal problem recorded during a run
 */
export interface InventoryIssue {
  /** What the issue is about (e.g. `my-project::gke_clusters`) */
  subject: string;
  stage: IssueStage;
  /** error: the operation failed; skipped: it was deliberately not attempted */
  severity: 'error' | 'skipped';
  message: string;
  error?: Error;
  timestamp: Date;
}

/**
 * Outcome of handing the workbook to object storage
 */
export type UploadResult =
  | { status: 'skipped'; reason: string }
  | { status: 'uploaded'; uri: string }
  | { status: 'failed'; uri: string; error: Error };

/**
 * One worksheet written by an export
 */
export interface ExportedSheet {
  /** ResourceSet label the sheet was built from */
  label: string;
  sheetName: string;
  rows: number;
  columns: number;
}

/**
 * Result of writing a workbook
 */
export interface ExportSummary {
  outputPath: string;
  sheets: ExportedSheet[];
  failures: { label: string; error: Error }[];
  /** Whether the placeholder sheet had to be added */
  placeholder: boolean;
}

/**
 * Excel export configuration options
 */
export interface ExcelExportOptions {
  /** Output file path for the workbook */
  outputPath: string;
  /** Name of the sheet written when nothing else could be (default: 'inventory') */
  placeholderSheetName?: string;
}
