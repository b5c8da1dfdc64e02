// Error Handling Utilities
import type { InventoryIssue, IssueStage } from './types.js';

/**
 * Error thrown when resources for a project could not be collected
 */
export class CollectionError extends Error {
  public readonly project: string;
  public readonly kind: string;

  constructor(project: string, kind: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionError';
    this.project = project;
    this.kind = kind;
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * IssueCollector collects and summarizes non-fatal problems of a run.
 * Lets collection, export and upload continue when a single item fails.
 */
export class IssueCollector {
  private readonly _issues: InventoryIssue[] = [];

  /**
   * Add an issue to the collection.
   */
  add(issue: InventoryIssue): void {
    this._issues.push(issue);
  }

  /**
   * Record a failed operation.
   */
  addError(subject: string, stage: IssueStage, error: Error): void {
    this.add({
      subject,
      stage,
      severity: 'error',
      message: error.message,
      error,
      timestamp: new Date(),
    });
  }

  /**
   * Record an operation that was deliberately not attempted.
   */
  addSkip(subject: string, stage: IssueStage, message: string): void {
    this.add({
      subject,
      stage,
      severity: 'skipped',
      message,
      timestamp: new Date(),
    });
  }

  get issues(): InventoryIssue[] {
    return [...this._issues];
  }

  get count(): number {
    return this._issues.length;
  }

  /**
   * Get a summary of issues by stage.
   */
  getSummary(): { total: number; errors: number; skipped: number; byStage: Record<string, number> } {
    const byStage: Record<string, number> = {};
    let errors = 0;

    for (const issue of this._issues) {
      byStage[issue.stage] = (byStage[issue.stage] || 0) + 1;
      if (issue.severity === 'error') {
        errors++;
      }
    }

    return {
      total: this._issues.length,
      errors,
      skipped: this._issues.length - errors,
      byStage,
    };
  }

  /**
   * Format issues as a human-readable string.
   */
  formatSummary(): string {
    if (this._issues.length === 0) {
      return 'No issues.';
    }

    const summary = this.getSummary();
    const lines = [`Issues: ${summary.total} (${summary.errors} failed, ${summary.skipped} skipped)`];
    for (const issue of this._issues) {
      const tag = issue.severity === 'error' ? 'failed' : 'skipped';
      lines.push(`  - [${issue.stage}] ${issue.subject} ${tag}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}
