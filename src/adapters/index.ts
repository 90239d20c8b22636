/**
 * Schema adapter registry
 */

import type { JobDefinition } from "../types";
import { ConfigurationError } from "../utils/errors";
import { municipalityAdapter } from "./municipality";
import { segmentsAdapter } from "./segments";
import type { JobListing, SchemaAdapter } from "./types";

export type { JobListing, SchemaAdapter } from "./types";
export { segmentsAdapter } from "./segments";
export { municipalityAdapter } from "./municipality";

const ADAPTERS: SchemaAdapter[] = [municipalityAdapter, segmentsAdapter];

export function selectAdapter(doc: unknown): SchemaAdapter {
  const adapter = ADAPTERS.find((candidate) => candidate.detect(doc));
  if (!adapter) {
    throw new ConfigurationError(
      "Unrecognized jobs file: expected a `municipalities`, `maps` or `jobs` mapping",
    );
  }
  return adapter;
}

export function parseJobDefinition(doc: unknown, key: string): JobDefinition {
  return selectAdapter(doc).parse(doc, key);
}

export function listJobs(doc: unknown): JobListing[] {
  return selectAdapter(doc).list(doc);
}
