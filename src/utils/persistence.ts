/**
 * Persistence sink for retrieved items
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { PersistenceError } from "./errors";

export interface ItemSink {
  /**
   * Store bytes under `filename`, returning the full path written
   */
  write(filename: string, bytes: Uint8Array): Promise<string>;
}

export class DirectorySink implements ItemSink {
  private prepared = false;

  constructor(private readonly directory: string) {}

  async write(filename: string, bytes: Uint8Array): Promise<string> {
    const outputPath = join(this.directory, filename);

    try {
      if (!this.prepared) {
        await mkdir(this.directory, { recursive: true });
        this.prepared = true;
      }
      await writeFile(outputPath, bytes);
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      throw new PersistenceError(
        `Cannot write ${outputPath}: ${details}`,
        outputPath,
        { cause: error },
      );
    }

    return outputPath;
  }
}
