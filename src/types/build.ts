/**
 * Build, Source Stamp and Worker Record Types
 *
 * Shapes of the records supplied by the data source. The formatter only
 * reads them.
 */

// Build Result Codes
export enum BuildResult {
  SUCCESS = 0,
  WARNINGS = 1,
  FAILURE = 2,
  SKIPPED = 3,
  EXCEPTION = 4,
  RETRY = 5,
  CANCELLED = 6,
}

// Reporting mode tags, e.g. ['change', 'problem']
export type ReportingMode = readonly string[];

export interface SourceStamp {
  ssid?: number;
  branch?: string | null;
  revision?: string | null;
  patch?: unknown;
  codebase?: string | null;
  project?: string | null;
  repository?: string | null;
}

export interface Buildset {
  bsid?: number;
  reason?: string | null;
  sourcestamps: SourceStamp[];
  [key: string]: unknown;
}

// Each property is a [value, source] pair
export type BuildProperties = Record<string, readonly [unknown, string]>;

export interface BuilderRef {
  builderid: number;
  name: string;
}

export interface PreviousBuild {
  results: BuildResult | null;
  [key: string]: unknown;
}

export interface BuildRecord {
  buildid?: number;
  number: number;
  results: BuildResult;
  state_string?: string | null;
  properties: BuildProperties;
  builder: BuilderRef;
  buildset: Buildset;
  prev_build?: PreviousBuild | null;
  [key: string]: unknown;
}

export interface WorkerRecord {
  workerid?: number;
  name: string;
  workerinfo?: Record<string, unknown>;
  last_connection?: string | null;
  [key: string]: unknown;
}

/**
 * Shared state handed to formatters and their extension hook.
 */
export interface MasterContext {
  config: {
    title: string;
    buildbotURL: string;
  };
  [key: string]: unknown;
}
