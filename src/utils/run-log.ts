/**
 * Run Log
 * Append-only record of one run, written to a file and echoed to the console.
 * Lifecycle: open → write* → close. A closed log cannot be written again.
 */

import { mkdir, open } from "fs/promises";
import type { FileHandle } from "fs/promises";
import { dirname } from "node:path";
import type { LogLevel } from "../types";
import { PersistenceError } from "./errors";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface RunLogOptions {
  level?: LogLevel;
  echo?: boolean;
  now?: () => Date;
}

export class RunLog {
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    readonly path: string,
    private readonly level: LogLevel,
    private readonly echo: boolean,
    private readonly now: () => Date,
  ) {}

  static async open(path: string, options: RunLogOptions = {}): Promise<RunLog> {
    let handle: FileHandle;
    try {
      await mkdir(dirname(path), { recursive: true });
      handle = await open(path, "a");
    } catch (error) {
      throw new PersistenceError(`Cannot open run log ${path}`, path, {
        cause: error,
      });
    }

    return new RunLog(
      handle,
      path,
      options.level ?? "info",
      options.echo ?? true,
      options.now ?? (() => new Date()),
    );
  }

  async debug(message: string): Promise<void> {
    await this.write("debug", message);
  }

  async info(message: string): Promise<void> {
    await this.write("info", message);
  }

  async warn(message: string): Promise<void> {
    await this.write("warn", message);
  }

  async error(message: string): Promise<void> {
    await this.write("error", message);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }

  private async write(level: LogLevel, message: string): Promise<void> {
    if (this.closed) {
      throw new PersistenceError("Run log is already closed", this.path);
    }
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = `${this.now().toISOString()} [${level.toUpperCase()}] ${message}`;

    try {
      await this.handle.appendFile(`${line}\n`, "utf-8");
    } catch (error) {
      throw new PersistenceError(`Cannot write run log ${this.path}`, this.path, {
        cause: error,
      });
    }

    if (this.echo) {
      if (level === "error") {
        console.error(line);
      } else if (level === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    }
  }
}
