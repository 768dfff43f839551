import { config } from 'dotenv';
import { join } from 'path';

/**
 * Load the .env file from the working directory, if there is one.
 * Variables already present in the environment take precedence.
 */
export function loadEnvFile(): void {
  const envPath = join(process.cwd(), '.env');

  config({
    path: envPath,
    override: false,
  });
}
