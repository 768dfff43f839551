import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { getLogConfig } from './config';

// Base logger configuration
const logConfig = getLogConfig();

const baseConfig: LoggerOptions = {
  level: logConfig.level,
  ...(logConfig.pretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            singleLine: false,
          },
        },
      }
    : {}),
  formatters: {
    level: (label: string) => {
      return { level: label.toUpperCase() };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

// Create base logger
const baseLogger = pino(baseConfig);

export type Logger = PinoLogger;

// Child logger carrying fixed bindings, e.g. { component: 'templates' }
export const createLogger = (context: Record<string, unknown> = {}): Logger => {
  return baseLogger.child(context);
};

// Default logger instance
export const logger = createLogger();

// Specialized loggers for different components
export const templateLogger = createLogger({ component: 'templates' });
export const formatterLogger = createLogger({ component: 'formatter' });

// Performance logging
export const createPerformanceLogger = (operation: string, log: Logger = logger) => {
  const start = Date.now();

  return {
    end: (context?: Record<string, unknown>) => {
      const duration = Date.now() - start;
      log.debug({
        operation,
        duration,
        ...context,
      }, 'Operation completed');
      return duration;
    },
    error: (error: Error, context?: Record<string, unknown>) => {
      const duration = Date.now() - start;
      log.error({
        operation,
        duration,
        err: error,
        ...context,
      }, 'Operation failed');
      return duration;
    },
  };
};
