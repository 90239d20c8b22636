import { describe, it, expect } from "vitest";
import type { Job, NamingSpec } from "../types";
import { planBatch } from "./planner";

const naming: NamingSpec = {
  baseNameSegments: ["Atlas"],
  year: 1890,
  extension: "jpg",
};

const job: Job = {
  host: "https://example.org",
  groups: [
    {
      defaultPath: "/idx/_N.jpg",
      pattern: "_N",
      prefix: "i",
      part: "index",
      indexStart: 1,
      indexStop: 2,
      zeroFillWidth: 2,
    },
    {
      defaultPath: "/pages/_N.jpg",
      pattern: "_N",
      prefix: "",
      indexStart: 1,
      indexStop: 3,
      zeroFillWidth: 0,
    },
  ],
};

describe("planBatch", () => {
  it("plans items in group order, then ascending index", () => {
    expect([...planBatch(job, naming)]).toEqual([
      {
        groupIndex: 0,
        index: 1,
        locator: "https://example.org/idx/i01.jpg",
        filename: "Atlas-1890-index-0001.jpg",
      },
      {
        groupIndex: 1,
        index: 1,
        locator: "https://example.org/pages/1.jpg",
        filename: "Atlas-1890-0001.jpg",
      },
      {
        groupIndex: 1,
        index: 2,
        locator: "https://example.org/pages/2.jpg",
        filename: "Atlas-1890-0002.jpg",
      },
    ]);
  });

  it("keeps identical indices of different parts apart", () => {
    const filenames = [...planBatch(job, naming)].map((item) => item.filename);
    expect(new Set(filenames).size).toBe(filenames.length);
  });
});
