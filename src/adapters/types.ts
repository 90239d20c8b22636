/**
 * Schema adapter contract
 * Each supported jobs file shape is turned into the same JobDefinition
 */

import type { JobDefinition } from "../types";

export interface JobListing {
  key: string;
  groups: number;
  items: number;
  error?: string; // Set when the job does not validate
}

export interface SchemaAdapter {
  name: string;
  detect(doc: unknown): boolean;
  list(doc: unknown): JobListing[];
  parse(doc: unknown, key: string): JobDefinition;
}
