import { describe, it, expect } from 'vitest';
import {
  detectedStatusText,
  projectsText,
  sourceStampText,
  summaryText,
} from '../../src/services/message/status-text';
import { BuildResult } from '../../src/types/build';

describe('status text', () => {
  describe('detectedStatusText', () => {
    it('reports a new failure when the result changed in change mode', () => {
      expect(detectedStatusText(['change'], BuildResult.FAILURE, BuildResult.WARNINGS)).toBe('new failure');
      expect(detectedStatusText(['change'], BuildResult.FAILURE, BuildResult.SUCCESS)).toBe('new failure');
    });

    it('reports a failed build when the previous build also failed', () => {
      expect(detectedStatusText(['change'], BuildResult.FAILURE, BuildResult.FAILURE)).toBe('failed build');
      expect(detectedStatusText(['change', 'problem'], BuildResult.FAILURE, BuildResult.FAILURE)).toBe('failed build');
    });

    it('reports a failed build without history', () => {
      expect(detectedStatusText(['change'], BuildResult.FAILURE, null)).toBe('failed build');
      expect(detectedStatusText(['problem'], BuildResult.FAILURE, undefined)).toBe('failed build');
      expect(detectedStatusText(['all'], BuildResult.FAILURE, BuildResult.WARNINGS)).toBe('failed build');
    });

    it('treats a previous success as no problem history in problem mode', () => {
      expect(detectedStatusText(['problem'], BuildResult.FAILURE, BuildResult.WARNINGS)).toBe('new failure');
      expect(detectedStatusText(['problem'], BuildResult.FAILURE, BuildResult.EXCEPTION)).toBe('new failure');
      expect(detectedStatusText(['problem'], BuildResult.FAILURE, BuildResult.SUCCESS)).toBe('failed build');
    });

    it('describes warnings and exceptions regardless of mode', () => {
      expect(detectedStatusText(['change'], BuildResult.WARNINGS, BuildResult.SUCCESS)).toBe('problem in the build');
      expect(detectedStatusText(['failing'], BuildResult.EXCEPTION, null)).toBe('build exception');
    });

    it('reports a restored build only in change mode', () => {
      expect(detectedStatusText(['change'], BuildResult.SUCCESS, BuildResult.FAILURE)).toBe('restored build');
      expect(detectedStatusText(['problem'], BuildResult.SUCCESS, BuildResult.FAILURE)).toBe('passing build');
      expect(detectedStatusText(['change'], BuildResult.SUCCESS, BuildResult.SUCCESS)).toBe('passing build');
      expect(detectedStatusText(['change'], BuildResult.SUCCESS, null)).toBe('passing build');
    });

    it('falls back to the result name for other codes', () => {
      const unknownCode: number = 42;

      expect(detectedStatusText(['all'], BuildResult.SKIPPED, null)).toBe('skipped build');
      expect(detectedStatusText(['all'], BuildResult.RETRY, null)).toBe('retry build');
      expect(detectedStatusText(['all'], BuildResult.CANCELLED, null)).toBe('cancelled build');
      expect(detectedStatusText(['all'], unknownCode, null)).toBe('Invalid status build');
    });
  });

  describe('summaryText', () => {
    it('says the build succeeded without the state string', () => {
      expect(summaryText({ state_string: 'build successful' }, BuildResult.SUCCESS)).toBe('Build succeeded!');
    });

    it('appends the state string to warnings and failures', () => {
      expect(summaryText({ state_string: 'compiling' }, BuildResult.FAILURE)).toBe('BUILD FAILED: compiling');
      expect(summaryText({ state_string: 'lint' }, BuildResult.WARNINGS)).toBe('Build Had Warnings: lint');
      expect(summaryText({ state_string: 'interrupted' }, BuildResult.EXCEPTION)).toBe('BUILD FAILED: interrupted');
    });

    it('omits the suffix when the state string is empty', () => {
      expect(summaryText({ state_string: '' }, BuildResult.WARNINGS)).toBe('Build Had Warnings');
      expect(summaryText({ state_string: null }, BuildResult.FAILURE)).toBe('BUILD FAILED');
      expect(summaryText({}, BuildResult.EXCEPTION)).toBe('BUILD FAILED');
    });

    it('never appends the state string to a cancelled build', () => {
      expect(summaryText({ state_string: '' }, BuildResult.CANCELLED)).toBe('Build was cancelled');
      expect(summaryText({ state_string: 'stopped' }, BuildResult.CANCELLED)).toBe('Build was cancelled');
    });
  });

  describe('sourceStampText', () => {
    it('formats a branch and revision', () => {
      expect(
        sourceStampText([{ branch: 'main', revision: 'abc123', patch: null, codebase: '' }])
      ).toBe('Build Source Stamp: [branch main] abc123\n');
    });

    it('names the codebase and falls back to HEAD with a patch', () => {
      expect(
        sourceStampText([{ branch: null, revision: null, patch: { level: 1 }, codebase: 'lib' }])
      ).toBe("Build Source Stamp 'lib': HEAD (plus patch)\n");
    });

    it('writes one line per stamp in order', () => {
      expect(
        sourceStampText([
          { codebase: 'app', branch: 'release', revision: 'f00d' },
          { codebase: 'docs', revision: 'beef' },
        ])
      ).toBe("Build Source Stamp 'app': [branch release] f00d\nBuild Source Stamp 'docs': beef\n");
    });

    it('returns an empty string for no stamps', () => {
      expect(sourceStampText([])).toBe('');
    });
  });

  describe('projectsText', () => {
    it('falls back to the default title', () => {
      expect(projectsText([], 'MyProject')).toBe('MyProject');
      expect(projectsText([{ project: '' }, { project: null }, {}], 'MyProject')).toBe('MyProject');
    });

    it('lists each project once in first-seen order', () => {
      expect(projectsText([{ project: 'A' }, { project: 'B' }, { project: 'A' }], 'X')).toBe('A, B');
      expect(projectsText([{ project: 'B' }, { project: '' }, { project: 'A' }], 'X')).toBe('B, A');
    });
  });
});
