import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  getUserConfigPath,
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    expect(await loadDefaultConfig()).toEqual({
      jobsFile: "volumes.yml",
      http: {
        timeout: 30000,
        userAgent: "volume-fetcher/0.1.0",
        statusPolicy: "keep",
      },
      logging: { level: "info", echo: true },
    });
  });
});

describe("mergeConfig", () => {
  it("overrides nested values one at a time", async () => {
    const base = await loadDefaultConfig();

    const merged = mergeConfig(base, {
      http: { statusPolicy: "fail" },
      logging: { echo: false },
    });

    expect(merged.http).toEqual({
      timeout: 30000,
      userAgent: "volume-fetcher/0.1.0",
      statusPolicy: "fail",
    });
    expect(merged.logging).toEqual({ level: "info", echo: false });
    expect(merged.jobsFile).toBe("volumes.yml");
  });
});

describe.runIf(process.platform === "linux")("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "load-config-"));
    vi.stubEnv("XDG_CONFIG_HOME", dir);
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves the user settings file under XDG_CONFIG_HOME", () => {
    expect(getUserConfigPath()).toBe(join(dir, "volume-fetcher", "config.json"));
  });

  it("applies user settings, then the custom file on top", async () => {
    await mkdir(join(dir, "volume-fetcher"));
    await writeFile(
      getUserConfigPath(),
      JSON.stringify({ http: { timeout: 1000, statusPolicy: "fail" } }),
    );
    const custom = join(dir, "custom.json");
    await writeFile(custom, JSON.stringify({ http: { timeout: 2000 } }));

    const { config, errors } = await loadConfig(custom);

    expect(errors).toEqual([]);
    expect(config.http).toEqual({
      timeout: 2000,
      userAgent: "volume-fetcher/0.1.0",
      statusPolicy: "fail",
    });
  });
});
