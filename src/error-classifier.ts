/**
 * Error classification for Google Cloud calls
 * Categorizes API and gcloud failures so log lines can carry a useful hint
 */

export enum ErrorType {
  API_DISABLED = 'api_disabled',
  PERMISSION_DENIED = 'permission_denied',
  UNAUTHENTICATED = 'unauthenticated',
  NOT_FOUND = 'not_found',
  QUOTA = 'quota',
  NETWORK = 'network',
  CLI_MISSING = 'cli_missing',
  UNKNOWN = 'unknown',
}

/**
 * Read a `code` or `status` property that client libraries attach to errors.
 */
function errorCode(error: Error): string {
  const parts: string[] = [];
  for (const key of ['code', 'status'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'string' || typeof value === 'number') {
        parts.push(String(value));
      }
    }
  }
  return parts.join(' ');
}

/**
 * Error classifier - categorizes errors and suggests what to check
 */
export class ErrorClassifier {
  /**
   * Classify error based on its message and code
   */
  classify(error: Error): ErrorType {
    const text = `${errorCode(error)} ${error.message}`.toLowerCase();

    if (this.isCliMissing(text)) {
      return ErrorType.CLI_MISSING;
    }
    // Disabled-API responses are 403s too, so check them first
    if (this.isApiDisabled(text)) {
      return ErrorType.API_DISABLED;
    }
    if (this.isUnauthenticated(text)) {
      return ErrorType.UNAUTHENTICATED;
    }
    if (this.isPermissionDenied(text)) {
      return ErrorType.PERMISSION_DENIED;
    }
    if (this.isQuota(text)) {
      return ErrorType.QUOTA;
    }
    if (this.isNotFound(text)) {
      return ErrorType.NOT_FOUND;
    }
    if (this.isNetwork(text)) {
      return ErrorType.NETWORK;
    }

    return ErrorType.UNKNOWN;
  }

  /**
   * Get a short hint for the operator
   */
  getHint(errorType: ErrorType): string {
    switch (errorType) {
      case ErrorType.API_DISABLED:
        return 'the API is not enabled for this project';
      case ErrorType.PERMISSION_DENIED:
        return 'the caller lacks permission (roles/viewer and roles/cloudasset.viewer are usually enough)';
      case ErrorType.UNAUTHENTICATED:
        return 'no valid credentials; set GOOGLE_APPLICATION_CREDENTIALS or run `gcloud auth application-default login`';
      case ErrorType.NOT_FOUND:
        return 'the project or resource does not exist';
      case ErrorType.QUOTA:
        return 'a quota or rate limit was exceeded';
      case ErrorType.NETWORK:
        return 'the service could not be reached';
      case ErrorType.CLI_MISSING:
        return 'the gcloud CLI is not installed or not on PATH';
      default:
        return 'unexpected error';
    }
  }

  /**
   * Classify and describe an error in one line
   */
  describe(error: Error): string {
    return `${error.message} (${this.getHint(this.classify(error))})`;
  }

  private isCliMissing(text: string): boolean {
    return /enoent/.test(text) && /gcloud/.test(text);
  }

  private isApiDisabled(text: string): boolean {
    return /service_disabled|has not been used in project|api .*is disabled|it is disabled/.test(text);
  }

  private isUnauthenticated(text: string): boolean {
    return /\b401\b|unauthenticated|could not load the default credentials|invalid_grant|reauthentication/.test(text);
  }

  private isPermissionDenied(text: string): boolean {
    return /\b403\b|permission_denied|permission denied|does not have permission|forbidden/.test(text);
  }

  private isQuota(text: string): boolean {
    return /\b429\b|quota|rate limit|resource_exhausted/.test(text);
  }

  private isNotFound(text: string): boolean {
    return /\b404\b|not_found|not found/.test(text);
  }

  private isNetwork(text: string): boolean {
    return /econnrefused|enotfound|etimedout|econnreset|socket hang up|network/.test(text);
  }
}
