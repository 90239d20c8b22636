/**
 * Municipality adapter
 * Sanborn-style jobs files keyed by municipality, with `pad_num` standing in
 * for a zero-fill width of 4
 */

import type { JobDefinition, MunicipalityJob, PathGroup } from "../types";
import { MunicipalityDocumentSchema, MunicipalityJobSchema } from "../types";
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

export const NAME_PREFIX = "Sanborn-LOC";
const PAD_WIDTH = 4;

function toGroups(job: MunicipalityJob): PathGroup[] {
  return job.paths.map((path) => ({
    defaultPath: path.default_path,
    pattern: path.regex,
    prefix: path.prefix,
    part: path.part,
    indexStart: path.index_start,
    indexStop: path.index_stop,
    zeroFillWidth: path.pad_num ? PAD_WIDTH : 0,
  }));
}

export const municipalityAdapter: SchemaAdapter = {
  name: "municipality",

  detect(doc: unknown): boolean {
    return isRecord(doc) && isRecord(doc.municipalities);
  },

  list(doc: unknown): JobListing[] {
    const { municipalities } = parseWith(
      MunicipalityDocumentSchema,
      doc,
      "jobs file",
    );
    return Object.entries(municipalities).map(([key, value]) => {
      const result = MunicipalityJobSchema.safeParse(value);
      if (!result.success) {
        return { key, groups: 0, items: 0, error: formatIssues(result.error) };
      }
      const groups = toGroups(result.data);
      return { key, groups: groups.length, items: countItems(groups) };
    });
  },

  parse(doc: unknown, key: string): JobDefinition {
    const { host, municipalities } = parseWith(
      MunicipalityDocumentSchema,
      doc,
      "jobs file",
    );
    const municipality = parseWith(
      MunicipalityJobSchema,
      lookupJob(municipalities, key, "municipalities"),
      `municipality "${key}"`,
    );

    return validatePatterns({
      key,
      job: { host, groups: toGroups(municipality) },
      naming: {
        baseNameSegments: [NAME_PREFIX, municipality.name, municipality.state],
        year: municipality.year,
        volume: municipality.vol,
        extension: normalizeExtension(municipality.extension),
      },
    });
  },
};
