/**
 * Config command - Show where user settings live and what they may set
 */

import { existsSync } from "fs";
import chalk from "chalk";
import { getUserConfigPath } from "../../utils";

const SETTING_KEYS = [
  "jobsFile",
  "http.timeout",
  "http.userAgent",
  "http.statusPolicy (keep | fail)",
  "logging.level (debug | info | warn | error)",
  "logging.echo",
];

export function configCommand(): void {
  const configPath = getUserConfigPath();
  const state = existsSync(configPath)
    ? chalk.green("found")
    : chalk.dim("not created");

  console.log(`Settings file: ${configPath} (${state})`);
  console.log(`\nJSON keys: ${SETTING_KEYS.join(", ")}`);
  console.log("--config and command-line flags take precedence over this file.");
}
