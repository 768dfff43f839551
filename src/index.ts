export * from './types';
export * from './services';
export {
  AppError,
  ConfigurationError,
  TemplateNotFoundError,
  TemplateSyntaxError,
  UndefinedContextKeyError,
} from './lib/errors';
export { resultUtils, urlUtils } from './lib/utils';
export { parseBuildFormatterOptions, parseFormatterOptions } from './lib/validation';
export type { BuildFormatterOptions, FormatterOptions } from './lib/validation';
export { createLogger, logger } from './lib/logger';
export type { Logger } from './lib/logger';
