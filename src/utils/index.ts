/**
 * Utility exports
 */

// Errors
export {
  AppError,
  ConfigurationError,
  RetrievalError,
  PersistenceError,
} from "./errors";
export type { RetrievalFailureReason } from "./errors";

// Locators and filenames
export {
  compilePattern,
  padNumeral,
  replacementToken,
  matchesTemplate,
  resolveLocator,
} from "./resolve-locator";
export {
  nameSegments,
  joinSegments,
  buildImageFilename,
  buildLogFilename,
} from "./build-filename";

// Network utilities
export { HttpRetriever } from "./retriever";
export type { Retriever, RetrievedPayload, RetrieverOptions } from "./retriever";

// Filesystem utilities
export { DirectorySink } from "./persistence";
export type { ItemSink } from "./persistence";
export { loadJobsFile } from "./load-jobs-file";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { RunLog } from "./run-log";
export type { RunLogOptions } from "./run-log";
export { Tracker } from "./tracker";
export type { ItemIssue, ItemIssueReason } from "./tracker";
