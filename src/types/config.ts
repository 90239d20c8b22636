/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// ============================================================================
// Settings (default.json → user config → --config)
// ============================================================================

export const HttpConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  userAgent: z.string(),
  // "keep" writes any HTTP response body to disk, "fail" treats non-2xx as a failed item
  statusPolicy: z.enum(["keep", "fail"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  echo: z.boolean(),
});

export const FetcherConfigSchema = z.object({
  jobsFile: z.string(),
  http: HttpConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialFetcherConfigSchema = FetcherConfigSchema.partial().extend({
  http: HttpConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type StatusPolicy = HttpConfig["statusPolicy"];
export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;
export type PartialFetcherConfig = z.infer<typeof PartialFetcherConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}

// ============================================================================
// Jobs files
// ============================================================================

// YAML gives `vol: 2` as a number and `vol: 2A` as a string; a falsy
// volume (null, "", 0) means the job has none
const VolumeSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value ? String(value) : undefined));

const PartSchema = z
  .string()
  .nullish()
  .transform((value) => value || undefined);

const YearSchema = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * Jobs keyed under `maps` (or `jobs`), naming rules in `filename_segments`
 * and a nested `index` block per path entry
 */
export const SegmentsPathSchema = z
  .object({
    prefix: z.string().default(""),
    part: PartSchema,
    default_path: z.string(),
    regex: z.string().min(1),
    index: z.object({
      start: z.number().int(),
      stop: z.number().int(),
      zfill_width: z.number().int().nonnegative().default(0),
    }),
  })
  .refine((path) => path.index.start < path.index.stop, {
    message: "index.start must be lower than index.stop",
    path: ["index"],
  });

export const SegmentsJobSchema = z.object({
  filename_segments: z.object({
    name: z.array(z.string().min(1)).min(1),
    year: YearSchema,
    vol: VolumeSchema,
    extension: z.string().min(1).default("jpg"),
  }),
  paths: z.array(SegmentsPathSchema).min(1),
});

export const SegmentsDocumentSchema = z
  .object({
    host: z.string().min(1),
    maps: z.record(z.string(), z.unknown()).optional(),
    jobs: z.record(z.string(), z.unknown()).optional(),
  })
  .refine((doc) => doc.maps !== undefined || doc.jobs !== undefined, {
    message: "expected a `maps` or `jobs` mapping",
  });

/**
 * Jobs keyed under `municipalities`, naming rules inline on the job and flat
 * `index_start`/`index_stop` with a boolean `pad_num` per path entry
 */
export const MunicipalityPathSchema = z
  .object({
    prefix: z.string().default(""),
    part: PartSchema,
    pad_num: z.boolean().default(false),
    default_path: z.string(),
    regex: z.string().min(1),
    index_start: z.number().int(),
    index_stop: z.number().int(),
  })
  .refine((path) => path.index_start < path.index_stop, {
    message: "index_start must be lower than index_stop",
    path: ["index_start"],
  });

export const MunicipalityJobSchema = z.object({
  name: z.string().min(1),
  state: z.string().min(1),
  year: YearSchema,
  vol: VolumeSchema,
  extension: z.string().min(1).default("jpg"),
  paths: z.array(MunicipalityPathSchema).min(1),
});

export const MunicipalityDocumentSchema = z.object({
  host: z.string().min(1),
  municipalities: z.record(z.string(), z.unknown()),
});

export type SegmentsJob = z.infer<typeof SegmentsJobSchema>;
export type SegmentsDocument = z.infer<typeof SegmentsDocumentSchema>;
export type MunicipalityJob = z.infer<typeof MunicipalityJobSchema>;
export type MunicipalityDocument = z.infer<typeof MunicipalityDocumentSchema>;
