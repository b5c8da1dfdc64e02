// GCP Inventory Exporter - Main Entry Point
export * from './types.js';
export * from './config.js';
export * from './records.js';
export * from './sheet-name.js';
export * from './flatten.js';
export * from './errors.js';
export * from './error-classifier.js';
export * from './resource-kinds.js';
export * from './collector.js';
export * from './uploader.js';
export * from './inventory.js';
export * from './exporters/index.js';
export * from './gcp/index.js';
