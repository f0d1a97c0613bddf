/**
 * Process-wide environment initialisation.
 *
 * Loads the local secrets file into the environment (never replacing
 * variables that are already set) and checks that every model the batch
 * names has its credentials. Runs once at startup, before any model call.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import dotenv from 'dotenv';
import { assertCredentials, type ResolvedProvider } from './providers/provider.js';
import { ConfigurationError, toError } from './errors/index.js';

export const DEFAULT_ENV_FILE = '.env';

export interface EnvironmentOptions {
  /** Secrets file to load (default `.env` in the working directory) */
  envFile?: string;
  /** Fail when the secrets file does not exist (set when the user named one) */
  requireEnvFile?: boolean;
  /** Environment to populate (default process.env) */
  processEnv?: NodeJS.ProcessEnv;
}

export interface EnvironmentReport {
  envFile: string;
  /** Whether the secrets file was found and read */
  loaded: boolean;
  /** Variables taken from the file */
  applied: string[];
  /** Variables in the file that were already set and left alone */
  skipped: string[];
}

/**
 * Load the secrets file.
 *
 * @throws ConfigurationError if the file is required but missing, or unreadable
 */
export function initializeEnvironment(options: EnvironmentOptions = {}): EnvironmentReport {
  const envFile = resolve(options.envFile ?? DEFAULT_ENV_FILE);
  const processEnv = options.processEnv ?? process.env;

  if (!existsSync(envFile)) {
    if (options.requireEnvFile) {
      throw new ConfigurationError(`Env file not found: ${envFile}`, ['--env-file']);
    }
    return { envFile, loaded: false, applied: [], skipped: [] };
  }

  let parsed: Record<string, string>;
  try {
    parsed = dotenv.parse(readFileSync(envFile));
  } catch (error) {
    throw new ConfigurationError(`Cannot load env file ${envFile}: ${toError(error).message}`, ['--env-file']);
  }

  const applied: string[] = [];
  const skipped: string[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (processEnv[key] !== undefined) {
      skipped.push(key);
    } else {
      processEnv[key] = value;
      applied.push(key);
    }
  }

  return { envFile, loaded: true, applied, skipped };
}

/**
 * Resolve every model to its provider and check its API key is present.
 *
 * @throws ConfigurationError for the first model without credentials
 */
export function checkCredentials(models: Iterable<string>): ResolvedProvider[] {
  return assertCredentials(new Set(models));
}
