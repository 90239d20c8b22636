/**
 * Run context - everything one batch run reads from
 * Built by the CLI (or a test) and handed to the runner
 */

import type { JobDefinition } from "./job";
import type { LoggingConfig } from "./config";
import type { Retriever } from "../utils/retriever";
import type { ItemSink } from "../utils/persistence";
import type { Tracker } from "../utils/tracker";

export interface RunContext {
  definition: JobDefinition;
  outputDir: string;

  retriever: Retriever;
  sink: ItemSink;
  tracker: Tracker;

  logging?: Partial<LoggingConfig>;
  signal?: AbortSignal; // Checked between items
  now?: () => Date; // Clock for log records and start/end markers
}
