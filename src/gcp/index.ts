// Google Cloud backends
import type { BackendName, ObjectUploader, ResourceSource } from '../types.js';
import { GoogleApisClient } from './api-client.js';
import { GcloudClient } from './gcloud-client.js';

export { getAuth, resetAuth } from './auth.js';
export type { GoogleAuthClient } from './auth.js';
export { GoogleApisClient, collectPages, XLSX_MIME_TYPE } from './api-client.js';
export { GcloudClient, runGcloud, matchesService, KIND_COMMANDS } from './gcloud-client.js';
export type { CommandRunner } from './gcloud-client.js';

export type Backend = ResourceSource & ObjectUploader;

/**
 * Create the client that performs collection and upload calls.
 */
export function createBackend(name: BackendName): Backend {
  switch (name) {
    case 'api':
      return new GoogleApisClient();
    case 'gcloud':
      return new GcloudClient();
  }
}
