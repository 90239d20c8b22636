/**
 * Runner Module
 * Fetches every planned item in order and stores what it gets.
 * A failed item is logged and skipped; only run log failures stop the batch.
 */

import { join } from "node:path";
import type { RunContext, RunSummary } from "../types";
import {
  buildLogFilename,
  matchesTemplate,
  PersistenceError,
  RetrievalError,
  RunLog,
} from "../utils";
import { planBatch } from "./planner";

export async function run(ctx: RunContext): Promise<RunSummary> {
  const { definition, outputDir, retriever, sink, tracker, signal } = ctx;
  const { job, naming } = definition;
  const now = ctx.now ?? (() => new Date());

  const log = await RunLog.open(join(outputDir, buildLogFilename(naming)), {
    level: ctx.logging?.level,
    echo: ctx.logging?.echo,
    now,
  });

  const isLogFailure = (error: unknown): boolean =>
    error instanceof PersistenceError && error.path === log.path;

  let fatal: unknown;

  try {
    await log.info(`Start run: ${now().toISOString()}`);
    await log.debug(`Job "${definition.key}" on ${job.host}`);

    for (const [i, group] of job.groups.entries()) {
      if (!matchesTemplate(group)) {
        await log.warn(
          `Path ${i}: regex "${group.pattern}" does not match "${group.defaultPath}"; every index resolves to the same URL`,
        );
      }
    }

    for (const item of planBatch(job, naming)) {
      if (signal?.aborted) {
        tracker.markCancelled();
        await log.warn(`Run cancelled before index ${item.index}`);
        break;
      }

      tracker.incrementAttempted();

      try {
        await log.debug(`Fetching ${item.locator}`);
        const payload = await retriever.retrieve(item.locator);

        if (!payload.ok) {
          tracker.incrementNonOk();
          await log.warn(
            `HTTP ${payload.status} for index ${item.index} (${item.locator}); body saved as-is`,
          );
        }

        await sink.write(item.filename, payload.bytes);
        tracker.incrementSucceeded();
        await log.info(`Renamed file to ${item.filename}`);
      } catch (error) {
        const recoverable =
          error instanceof RetrievalError ||
          (error instanceof PersistenceError && !isLogFailure(error));
        if (!recoverable) {
          throw error;
        }

        const issue = tracker.trackFailure(item.index, item.locator, error);
        await log.error(
          `Failed index ${item.index} (${item.locator}): ${issue.details}`,
        );
      }
    }
  } catch (error) {
    fatal = error;
    throw error;
  } finally {
    try {
      if (!isLogFailure(fatal)) {
        await log.info(`End run: ${now().toISOString()}`);
      }
    } finally {
      await log.close();
    }
  }

  return tracker.getSummary(log.path);
}
