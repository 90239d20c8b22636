import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { RetrievalError, Tracker } from "../utils";
import { formatDuration, stats } from "./stats";

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(850)).toBe("850ms");
    expect(formatDuration(12_400)).toBe("12.4s");
    expect(formatDuration(187_000)).toBe("3m 07s");
  });
});

describe("stats", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints counts and failures grouped by reason", () => {
    const tracker = new Tracker();
    const locator = "https://example.org/img/p0002.jpg";
    tracker.trackFailure(2, locator, new RetrievalError("fetch failed", locator, "network"));

    stats(
      {
        attempted: 3,
        succeeded: 2,
        failed: 1,
        cancelled: false,
        logFile: "/tmp/out/Atlas.log",
        durationMs: 850,
      },
      tracker,
      true,
    );

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("2 of 3"));
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("network 1"));
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("/tmp/out/Atlas.log"));
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining(locator));
  });
});
