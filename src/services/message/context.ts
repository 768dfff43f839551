import type {
  BuildRecord,
  Buildset,
  ReportingMode,
  WorkerRecord,
} from '../../types/build';
import { UNKNOWN_WORKER_NAME } from '../../lib/constants';
import { detectedStatusText, sourceStampText, summaryText } from './status-text';

export interface BuildContextInput {
  mode: ReportingMode;
  builderName: string;
  build: BuildRecord;
  previousResults: number | null;
  blamelist: readonly string[];
  projectsText: string;
  buildURL: string;
  buildbotURL: string;
}

// Keys every build-result template can rely on
export type BuildMessageContext = {
  results: number;
  mode: ReportingMode;
  buildername: string;
  workername: unknown;
  buildset: Buildset;
  build: BuildRecord;
  projects: string;
  previous_results: number | null;
  status_detected: string;
  build_url: string;
  buildbot_url: string;
  blamelist: readonly string[];
  summary: string;
  sourcestamps: string;
};

export type MissingWorkerMessageContext = {
  buildbot_title: string;
  buildbot_url: string;
  worker: WorkerRecord;
};

// First element of the workername property, as the worker reported it
const workerNameOf = (build: BuildRecord): unknown => {
  const property = build.properties['workername'];
  return property ? property[0] : UNKNOWN_WORKER_NAME;
};

export function buildContextForResult(input: BuildContextInput): BuildMessageContext {
  const { mode, builderName, build, previousResults } = input;
  const buildset = build.buildset;
  const results = build.results;

  return {
    results,
    mode,
    buildername: builderName,
    workername: workerNameOf(build),
    buildset,
    build,
    projects: input.projectsText,
    previous_results: previousResults,
    status_detected: detectedStatusText(mode, results, previousResults),
    build_url: input.buildURL,
    buildbot_url: input.buildbotURL,
    blamelist: input.blamelist,
    summary: summaryText(build, results),
    sourcestamps: sourceStampText(buildset.sourcestamps),
  };
}

export function buildContextForMissingWorker(
  titleText: string,
  buildbotURL: string,
  worker: WorkerRecord
): MissingWorkerMessageContext {
  return {
    buildbot_title: titleText,
    buildbot_url: buildbotURL,
    worker,
  };
}
