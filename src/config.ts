/**
 * Configuration loading: TOML text to a validated Config.
 */

import { readFile } from 'fs/promises';
import { parse as parseToml } from 'smol-toml';
import type { ZodError } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { configSchema, type Config } from './models/config.js';

/**
 * Flatten zod issues into "path: message" fragments.
 */
function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Parse and validate configuration text.
 */
export function parseConfig(text: string): Config {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (e) {
    throw new ConfigError(`Unable to parse configuration: ${errorMessage(e)}`, e);
  }

  const result = configSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Read, parse and validate the configuration file at `path`.
 */
export async function loadConfig(path: string): Promise<Config> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    throw new ConfigError(`Unable to read configuration file ${path}: ${errorMessage(e)}`, e);
  }
  return parseConfig(text);
}
