/**
 * Jobs File Loader
 * Reads a YAML or JSON jobs document from disk
 */

import { readFile } from "fs/promises";
import { extname, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "./errors";

export async function loadJobsFile(path: string): Promise<unknown> {
  const absolutePath = resolve(path);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Cannot read jobs file ${absolutePath}: ${details}`,
      absolutePath,
      { cause: error },
    );
  }

  try {
    return extname(absolutePath).toLowerCase() === ".json"
      ? JSON.parse(content)
      : parseYaml(content);
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Malformed jobs file ${absolutePath}: ${details}`,
      absolutePath,
      { cause: error },
    );
  }
}
