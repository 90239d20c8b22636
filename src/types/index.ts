/**
 * Central type exports
 */

// Configuration
export type {
  FetcherConfig,
  PartialFetcherConfig,
  HttpConfig,
  LoggingConfig,
  LogLevel,
  StatusPolicy,
  ConfigError,
  SegmentsJob,
  SegmentsDocument,
  MunicipalityJob,
  MunicipalityDocument,
} from "./config";
export {
  FetcherConfigSchema,
  PartialFetcherConfigSchema,
  SegmentsDocumentSchema,
  SegmentsJobSchema,
  MunicipalityDocumentSchema,
  MunicipalityJobSchema,
} from "./config";

// Jobs
export type {
  Job,
  PathGroup,
  NamingSpec,
  JobDefinition,
  PlannedItem,
  RunSummary,
} from "./job";

// Context
export type { RunContext } from "./context";
