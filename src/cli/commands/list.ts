/**
 * List command - Show the jobs declared in a jobs file
 */

import chalk from "chalk";
import { listJobs } from "../../adapters";
import { loadConfig, loadJobsFile } from "../../utils";

interface ListOptions {
  jobs?: string;
  config?: string;
}

export async function listCommand(opts: ListOptions): Promise<void> {
  try {
    const { config } = await loadConfig(opts.config);
    const jobsFile = opts.jobs ?? config.jobsFile;
    const listings = listJobs(await loadJobsFile(jobsFile));

    console.log(chalk.gray(`Jobs in ${jobsFile}:\n`));
    for (const listing of listings) {
      if (listing.error) {
        console.log(`  ${chalk.red("✖")} ${listing.key} ${chalk.dim(listing.error)}`);
        continue;
      }
      console.log(
        `  ${chalk.green("◉")} ${listing.key} ${chalk.dim(`${listing.groups} group(s), ${listing.items} item(s)`)}`,
      );
    }
  } catch (error) {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }
}
