// Message Formatting Constants

// Display names indexed by BuildResult code
export const RESULT_NAMES = [
  'success',
  'warnings',
  'failure',
  'skipped',
  'exception',
  'retry',
  'cancelled',
] as const;

export const UNKNOWN_WORKER_NAME = '<unknown>';

// Bundled template file names
export const DEFAULT_TEMPLATES = {
  BUILD_RESULT: 'default_mail.txt',
  MISSING_WORKER: 'missing_mail.txt',
} as const;

export const DEFAULT_TEMPLATE_TYPE = 'plain';
