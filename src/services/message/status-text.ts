import { BuildResult } from '../../types/build';
import type { BuildRecord, ReportingMode, SourceStamp } from '../../types/build';
import { resultUtils } from '../../lib/utils';

/**
 * Short description of what the build outcome means for the reporting mode,
 * e.g. "new failure" or "restored build".
 *
 * `previousResults` is null or undefined when there was no earlier build.
 */
export function detectedStatusText(
  mode: ReportingMode,
  results: number,
  previousResults?: number | null
): string {
  const hasPrevious = previousResults !== null && previousResults !== undefined;

  switch (results) {
    case BuildResult.FAILURE:
      if (mode.includes('change') && hasPrevious && previousResults !== results) {
        return 'new failure';
      }
      // a previous SUCCESS (0) does not count here
      if (mode.includes('problem') && previousResults && previousResults !== BuildResult.FAILURE) {
        return 'new failure';
      }
      return 'failed build';
    case BuildResult.WARNINGS:
      return 'problem in the build';
    case BuildResult.SUCCESS:
      if (mode.includes('change') && hasPrevious && previousResults !== results) {
        return 'restored build';
      }
      return 'passing build';
    case BuildResult.EXCEPTION:
      return 'build exception';
    default:
      return `${resultUtils.statusToString(results)} build`;
  }
}

/**
 * One-line summary of the build, suffixed with its state string where relevant.
 */
export function summaryText(build: Pick<BuildRecord, 'state_string'>, results: number): string {
  const suffix = build.state_string ? `: ${build.state_string}` : '';

  switch (results) {
    case BuildResult.SUCCESS:
      return 'Build succeeded!';
    case BuildResult.WARNINGS:
      return `Build Had Warnings${suffix}`;
    case BuildResult.CANCELLED:
      return 'Build was cancelled';
    default:
      return `BUILD FAILED${suffix}`;
  }
}

/**
 * One "Build Source Stamp" line per stamp, each terminated by a newline.
 */
export function sourceStampText(stamps: readonly SourceStamp[]): string {
  let text = '';

  for (const ss of stamps) {
    let source = '';
    if (ss.branch) {
      source += `[branch ${ss.branch}] `;
    }
    source += ss.revision ? String(ss.revision) : 'HEAD';
    if (ss.patch !== null && ss.patch !== undefined) {
      source += ' (plus patch)';
    }

    const discriminator = ss.codebase ? ` '${ss.codebase}'` : '';
    text += `Build Source Stamp${discriminator}: ${source}\n`;
  }

  return text;
}

/**
 * Distinct project names in first-seen order, or the default title when no
 * stamp names a project.
 */
export function projectsText(stamps: readonly SourceStamp[], defaultTitle: string): string {
  const projects = new Set<string>();

  for (const ss of stamps) {
    if (ss.project) {
      projects.add(ss.project);
    }
  }

  if (projects.size === 0) {
    return defaultTitle;
  }

  return Array.from(projects).join(', ');
}
