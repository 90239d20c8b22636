/**
 * CLI entry point for the volume fetcher
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { fetchCommand } from "./commands/fetch";
import { configCommand } from "./commands/config";
import { listCommand } from "./commands/list";

const program = new Command();

program
  .name("volume-fetch")
  .description("Download the numbered page images of a scanned volume")
  .version("0.1.0");

// Fetch command (default when no command is given)
program
  .command("fetch", { isDefault: true })
  .description("Fetch every image of a job")
  .requiredOption("-k, --key <key>", "Job key in the jobs file")
  .requiredOption("-o, --out <path>", "Output directory for images and the run log")
  .option("-j, --jobs <path>", "Path to the YAML/JSON jobs file")
  .option("-c, --config <path>", "Path to custom settings file")
  .option("--dry-run", "List resolved URLs and filenames without fetching")
  .option("--strict-status", "Treat non-2xx responses as failed items")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .option("-v, --verbose", "Verbose output")
  .action(fetchCommand);

// List command - show jobs in a jobs file
program
  .command("list")
  .description("List the jobs declared in a jobs file")
  .option("-j, --jobs <path>", "Path to the YAML/JSON jobs file")
  .option("-c, --config <path>", "Path to custom settings file")
  .action(listCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
