/**
 * Job model - the normalized form every jobs file shape is adapted into
 */

export interface PathGroup {
  defaultPath: string; // URL path template, e.g. "/service/gmd/_PLACEHOLDER.jpg"
  pattern: string; // Regex source locating the substring to replace
  prefix: string; // Prepended to the padded numeral in the replacement token
  part?: string; // Optional filename label (e.g., "index")
  indexStart: number;
  indexStop: number; // Exclusive
  zeroFillWidth: number; // 0 disables padding
}

export interface Job {
  host: string; // Prepended verbatim to every resolved path
  groups: PathGroup[];
}

export interface NamingSpec {
  baseNameSegments: string[];
  year?: number;
  volume?: string;
  extension: string; // Without leading dot
}

/**
 * One selected job together with its naming rules
 */
export interface JobDefinition {
  key: string;
  job: Job;
  naming: NamingSpec;
}

/**
 * One (group, index) pair of a run, built just before it is fetched
 */
export interface PlannedItem {
  groupIndex: number;
  index: number;
  locator: string;
  filename: string;
}

export interface RunSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
  logFile: string;
  durationMs: number;
}
