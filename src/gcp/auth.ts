/**
 * Google Cloud credentials
 *
 * Uses Application Default Credentials: GOOGLE_APPLICATION_CREDENTIALS pointing
 * at a service account key, or the user credentials stored by
 * `gcloud auth application-default login`.
 */

import { google, type Auth } from 'googleapis';

export type GoogleAuthClient = Auth.GoogleAuth;

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

let _auth: GoogleAuthClient | null = null;

/**
 * Returns the shared GoogleAuth instance, creating it on first use.
 */
export function getAuth(): GoogleAuthClient {
  if (_auth) return _auth;
  _auth = new google.auth.GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });
  return _auth;
}

/**
 * Resets the cached auth instance. Used in tests to clear singleton state.
 */
export function resetAuth(): void {
  _auth = null;
}
