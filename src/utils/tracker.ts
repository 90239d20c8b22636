/**
 * Run Tracker
 * Counters and issues for one batch run
 */

import type { RunSummary } from "../types";
import { PersistenceError, RetrievalError } from "./errors";

// ============================================================================
// Issue types
// ============================================================================

export type ItemIssueReason =
  | "timeout"
  | "network"
  | "http-status"
  | "write-error"
  | "unknown";

export interface ItemIssue {
  index: number;
  locator: string;
  reason: ItemIssueReason;
  details: string;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapItemError(error: unknown): {
  reason: ItemIssueReason;
  details: string;
} {
  if (error instanceof RetrievalError) {
    return { reason: error.reason, details: error.message };
  }
  if (error instanceof PersistenceError) {
    return { reason: "write-error", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "unknown", details: error.message };
  }
  return { reason: "unknown", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private attempted = 0;
  private succeeded = 0;
  private failed = 0;
  private nonOkResponses = 0;
  private cancelled = false;
  private issues: ItemIssue[] = [];
  private startTime = new Date();

  incrementAttempted(): void {
    this.attempted++;
  }

  incrementSucceeded(): void {
    this.succeeded++;
  }

  incrementNonOk(): void {
    this.nonOkResponses++;
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  trackFailure(index: number, locator: string, error: unknown): ItemIssue {
    const { reason, details } = mapItemError(error);
    const issue: ItemIssue = { index, locator, reason, details };
    this.failed++;
    this.issues.push(issue);
    return issue;
  }

  getIssues(): ItemIssue[] {
    return this.issues;
  }

  getNonOkResponses(): number {
    return this.nonOkResponses;
  }

  getSummary(logFile: string): RunSummary {
    return {
      attempted: this.attempted,
      succeeded: this.succeeded,
      failed: this.failed,
      cancelled: this.cancelled,
      logFile,
      durationMs: Date.now() - this.startTime.getTime(),
    };
  }
}
