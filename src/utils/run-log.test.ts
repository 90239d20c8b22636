import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PersistenceError } from "./errors";
import { RunLog } from "./run-log";

const now = () => new Date("2026-01-02T03:04:05.000Z");

describe("RunLog", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "run-log-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes timestamped records at or above the level", async () => {
    const path = join(dir, "run.log");
    const log = await RunLog.open(path, { level: "info", echo: false, now });

    await log.debug("hidden");
    await log.info("hello");
    await log.warn("careful");
    await log.error("bad");
    await log.close();

    expect(await readFile(path, "utf-8")).toBe(
      [
        "2026-01-02T03:04:05.000Z [INFO] hello",
        "2026-01-02T03:04:05.000Z [WARN] careful",
        "2026-01-02T03:04:05.000Z [ERROR] bad",
        "",
      ].join("\n"),
    );
  });

  it("echoes the same record to the console", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = await RunLog.open(join(dir, "run.log"), { now });

    await log.info("Start run");
    await log.error("Failed index 2");
    await log.close();

    expect(logSpy).toHaveBeenCalledWith("2026-01-02T03:04:05.000Z [INFO] Start run");
    expect(errorSpy).toHaveBeenCalledWith(
      "2026-01-02T03:04:05.000Z [ERROR] Failed index 2",
    );
  });

  it("creates the output directory", async () => {
    const path = join(dir, "nested", "out", "run.log");
    const log = await RunLog.open(path, { echo: false, now });
    await log.info("x");
    await log.close();

    expect(await readFile(path, "utf-8")).toBe("2026-01-02T03:04:05.000Z [INFO] x\n");
  });

  it("refuses writes after close", async () => {
    const log = await RunLog.open(join(dir, "run.log"), { echo: false, now });
    await log.close();
    await log.close();

    await expect(log.info("late")).rejects.toBeInstanceOf(PersistenceError);
  });

  it("fails to open when the directory is a file", async () => {
    const blocker = join(dir, "blocker");
    const first = await RunLog.open(blocker, { echo: false, now });
    await first.close();

    await expect(
      RunLog.open(join(blocker, "run.log"), { echo: false, now }),
    ).rejects.toBeInstanceOf(PersistenceError);
  });
});
