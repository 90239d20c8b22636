/**
 * Helpers shared by the schema adapters
 */

import type { z } from "zod";
import type { JobDefinition, PathGroup } from "../types";
import { ConfigurationError } from "../utils/errors";
import { compilePattern } from "../utils/resolve-locator";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

/**
 * Parse with a schema, rethrowing validation failures as ConfigurationError
 */
export function parseWith<T extends z.ZodType>(
  schema: T,
  value: unknown,
  label: string,
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${label}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function lookupJob(
  jobs: Record<string, unknown>,
  key: string,
  section: string,
): unknown {
  if (!Object.hasOwn(jobs, key)) {
    const known = Object.keys(jobs);
    throw new ConfigurationError(
      `Job "${key}" not found under "${section}"` +
        (known.length > 0 ? ` (available: ${known.join(", ")})` : ""),
    );
  }
  return jobs[key];
}

export function normalizeExtension(extension: string): string {
  return extension.replace(/^\./, "");
}

/**
 * Compile every group pattern once so a bad regex fails before any fetch
 */
export function validatePatterns(definition: JobDefinition): JobDefinition {
  definition.job.groups.forEach((group: PathGroup, i) => {
    try {
      compilePattern(group.pattern);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        `Job "${definition.key}" path ${i}: ${details}`,
        undefined,
        { cause: error },
      );
    }
  });
  return definition;
}

export function countItems(groups: PathGroup[]): number {
  return groups.reduce(
    (total, group) => total + (group.indexStop - group.indexStart),
    0,
  );
}
