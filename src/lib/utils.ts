import { RESULT_NAMES } from './constants';

// Build Result Utilities
export const resultUtils = {
  // Canonical display word for a result code
  statusToString: (status: number | null | undefined): string => {
    if (status === null || status === undefined) {
      return 'not finished';
    }
    const name: string | undefined = RESULT_NAMES[status];
    return name ?? 'Invalid status';
  },
};

// URL Utilities
export const urlUtils = {
  // Link to a build's page in the web UI
  getURLForBuild: (buildbotURL: string, builderId: number, buildNumber: number): string => {
    const base = buildbotURL.endsWith('/') ? buildbotURL : `${buildbotURL}/`;
    return `${base}#/builders/${builderId}/builds/${buildNumber}`;
  },
};
