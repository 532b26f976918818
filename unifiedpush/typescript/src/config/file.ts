/**
 * Loading sender settings from a JSON configuration file.
 *
 * Expected format:
 * ```json
 * {
 *   "serverUrl": "https://push.example.com/ag-push",
 *   "pushApplicationId": "my-app-id",
 *   "masterSecret": "my-master-secret"
 * }
 * ```
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/**
 * Schema of the configuration file.
 */
export const PushConfigFileSchema = z.object({
  serverUrl: z.string().min(1, 'serverUrl can not be empty'),
  pushApplicationId: z.string().default(''),
  masterSecret: z.string().default(''),
});

export type PushConfigFile = z.infer<typeof PushConfigFileSchema>;

/**
 * Reads and validates a configuration file.
 * @throws ConfigurationError if the file is missing, not JSON, or invalid
 */
export function loadPushConfigFile(location: string): PushConfigFile {
  if (!location || location.trim().length === 0) {
    throw new ConfigurationError('config location can not be empty');
  }

  let raw: string;
  try {
    raw = readFileSync(location, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `unable to read config file ${location}`,
      error instanceof Error ? error : undefined
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `config file ${location} is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }

  const result = PushConfigFileSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`invalid config file ${location}: ${issues}`);
  }
  return result.data;
}
