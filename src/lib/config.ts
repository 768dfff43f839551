import { z } from 'zod';
import { loadEnvFile } from './env-loader';
import { ConfigurationError } from './errors';

// Environment validation schema
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z.string().transform(val => val.toLowerCase() === 'true').default('true'),
});

// Parse and validate environment variables
function validateEnv() {
  loadEnvFile();

  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const errorMessages = result.error.errors.map(err => {
      const path = err.path.join('.');
      return `${path}: ${err.message}`;
    });

    throw new ConfigurationError('Environment validation failed', { errors: errorMessages });
  }

  return result.data;
}

// Export validated configuration
export const config = validateEnv();

// Type for configuration object
export type Config = z.infer<typeof envSchema>;

// Helper functions
export const isDevelopment = () => config.NODE_ENV === 'development';

// Logging configuration
export const getLogConfig = () => ({
  level: config.LOG_LEVEL,
  pretty: config.LOG_PRETTY && isDevelopment(),
});
