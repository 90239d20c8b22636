/**
 * Stats Module
 * End-of-run summary: counts, run log location and failures by reason
 */

import chalk from "chalk";
import type { RunSummary } from "../types";
import type { Tracker } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Elapsed time as "850ms", "12.4s" or "3m 07s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const seconds = String(totalSeconds % 60).padStart(2, "0");
  return `${Math.floor(totalSeconds / 60)}m ${seconds}s`;
}

function row(
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${chalk.dim(label.padEnd(14))} ${color(String(value))}`;
}

// ============================================================================
// Summary Display
// ============================================================================

const MAX_LISTED_FAILURES = 10;

export function stats(
  summary: RunSummary,
  tracker: Tracker,
  verbose?: boolean,
): void {
  const nonOk = tracker.getNonOkResponses();
  const mark =
    summary.failed > 0
      ? chalk.red("✖")
      : summary.cancelled || nonOk > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");
  const title = summary.cancelled ? "Run cancelled" : "Run finished";

  console.log("");
  console.log(
    `  ${mark} ${chalk.bold(title)} ${chalk.dim(`in ${formatDuration(summary.durationMs)}`)}`,
  );
  console.log(
    row("Saved", `${summary.succeeded} of ${summary.attempted}`, chalk.green),
  );
  if (summary.failed > 0) {
    console.log(row("Failed", summary.failed, chalk.red));
  }
  if (nonOk > 0) {
    console.log(row("Non-2xx kept", nonOk, chalk.yellow));
  }
  console.log(row("Run log", summary.logFile, chalk.cyan));

  printFailures(tracker, verbose);

  console.log("");
}

function printFailures(tracker: Tracker, verbose?: boolean): void {
  const issues = tracker.getIssues();
  if (issues.length === 0) {
    return;
  }

  const byReason = new Map<string, number>();
  for (const issue of issues) {
    byReason.set(issue.reason, (byReason.get(issue.reason) ?? 0) + 1);
  }
  const breakdown = [...byReason]
    .map(([reason, count]) => `${reason} ${count}`)
    .join(", ");
  console.log(row("By reason", breakdown, chalk.red));

  if (!verbose) return;

  for (const issue of issues.slice(0, MAX_LISTED_FAILURES)) {
    console.log(`     ${chalk.dim(`#${issue.index}`)} ${issue.locator}`);
    console.log(`       ${chalk.dim(issue.details)}`);
  }
  if (issues.length > MAX_LISTED_FAILURES) {
    console.log(chalk.dim(`     +${issues.length - MAX_LISTED_FAILURES} more in the run log`));
  }
}
