/**
 * Segments adapter
 *
 * ```yaml
 * host: https://tile.example.org
 * maps:
 *   atlas-1890:
 *     filename_segments: { name: [Atlas, Ohio], year: 1890, vol: null }
 *     paths:
 *       - prefix: ""
 *         part: null
 *         default_path: /service/atlas/_0001.jpg
 *         regex: _[0-9]+
 *         index: { start: 1, stop: 40, zfill_width: 4 }
 * ```
 */

import type { JobDefinition, PathGroup, SegmentsJob } from "../types";
import { SegmentsDocumentSchema, SegmentsJobSchema } from "../types";
import type { JobListing, SchemaAdapter } from "./types";
import {
  countItems,
  formatIssues,
  isRecord,
  lookupJob,
  normalizeExtension,
  parseWith,
  validatePatterns,
} from "./shared";

function toGroups(job: SegmentsJob): PathGroup[] {
  return job.paths.map((path) => ({
    defaultPath: path.default_path,
    pattern: path.regex,
    prefix: path.prefix,
    part: path.part,
    indexStart: path.index.start,
    indexStop: path.index.stop,
    zeroFillWidth: path.index.zfill_width,
  }));
}

function readDocument(doc: unknown): {
  host: string;
  section: string;
  jobs: Record<string, unknown>;
} {
  const { host, maps, jobs } = parseWith(SegmentsDocumentSchema, doc, "jobs file");
  if (maps) return { host, section: "maps", jobs: maps };
  return { host, section: "jobs", jobs: jobs ?? {} };
}

export const segmentsAdapter: SchemaAdapter = {
  name: "segments",

  detect(doc: unknown): boolean {
    return isRecord(doc) && (isRecord(doc.maps) || isRecord(doc.jobs));
  },

  list(doc: unknown): JobListing[] {
    const { jobs } = readDocument(doc);
    return Object.entries(jobs).map(([key, value]) => {
      const result = SegmentsJobSchema.safeParse(value);
      if (!result.success) {
        return { key, groups: 0, items: 0, error: formatIssues(result.error) };
      }
      const groups = toGroups(result.data);
      return { key, groups: groups.length, items: countItems(groups) };
    });
  },

  parse(doc: unknown, key: string): JobDefinition {
    const { host, section, jobs } = readDocument(doc);
    const job = parseWith(
      SegmentsJobSchema,
      lookupJob(jobs, key, section),
      `job "${key}"`,
    );
    const segments = job.filename_segments;

    return validatePatterns({
      key,
      job: { host, groups: toGroups(job) },
      naming: {
        baseNameSegments: [...segments.name],
        year: segments.year,
        volume: segments.vol,
        extension: normalizeExtension(segments.extension),
      },
    });
  },
};
