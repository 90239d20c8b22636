/**
 * Fetch command - Loads settings and the selected job, then runs the batch
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import {
  ConfigurationError,
  DirectorySink,
  HttpRetriever,
  loadConfig,
  loadJobsFile,
  Tracker,
} from "../../utils";
import { parseJobDefinition } from "../../adapters";
import * as modules from "../../modules";
import type { ConfigError, FetcherConfig, JobDefinition } from "../../types";

const FetchOptionsSchema = z.object({
  key: z.string().min(1),
  out: z.string().min(1),
  jobs: z.string().optional(),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  strictStatus: z.boolean().optional(),
  timeout: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof FetchOptionsSchema>;

export interface PreparedFetch {
  config: FetcherConfig;
  definition: JobDefinition;
  errors: ConfigError[];
}

/**
 * Resolve settings (default → user → custom → CLI flags) and the selected job
 */
export async function prepareFetch(opts: Options): Promise<PreparedFetch> {
  const parsed = FetchOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }
  const options = parsed.data;

  const { config, errors } = await loadConfig(options.config);

  if (options.jobs) {
    config.jobsFile = options.jobs;
  }
  if (options.strictStatus) {
    config.http.statusPolicy = "fail";
  }
  if (options.timeout !== undefined) {
    config.http.timeout = options.timeout;
  }
  if (options.verbose) {
    config.logging.level = "debug";
  }

  const doc = await loadJobsFile(config.jobsFile);
  const definition = parseJobDefinition(doc, options.key);

  return { config, definition, errors };
}

function printPlan(definition: JobDefinition): void {
  let count = 0;
  for (const item of modules.planBatch(definition.job, definition.naming)) {
    console.log(
      `  ${chalk.dim(String(item.index).padStart(5))} ${item.locator} ${chalk.dim("→")} ${chalk.cyan(item.filename)}`,
    );
    count++;
  }
  console.log(chalk.gray(`\n  ${count} items planned (dry run, nothing fetched)\n`));
}

export async function fetchCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();

  try {
    const { config, definition, errors } = await prepareFetch(opts);

    for (const err of errors) {
      const details = err.error instanceof Error ? err.error.message : String(err.error);
      spinner.warn(`Ignoring settings file ${err.path}: ${details}`);
    }
    spinner.succeed(
      `Job ${chalk.bold(definition.key)} · ${definition.job.groups.length} path group(s)`,
    );

    if (opts.dryRun) {
      printPlan(definition);
      return;
    }

    const tracker = new Tracker();
    process.once("SIGINT", onInterrupt);

    const summary = await modules.run({
      definition,
      outputDir: opts.out,
      retriever: new HttpRetriever({
        timeout: config.http.timeout,
        userAgent: config.http.userAgent,
        statusPolicy: config.http.statusPolicy,
      }),
      sink: new DirectorySink(opts.out),
      tracker,
      logging: config.logging,
      signal: controller.signal,
    });

    modules.stats(summary, tracker, opts.verbose);
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail(
        error instanceof ConfigurationError ? "Invalid configuration" : "Run failed",
      );
    }
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
