/**
 * Settings Loader Module
 *
 * Loads the YAML settings file describing the agent host, the subscription
 * servers and every hypervisor under test.
 *
 * @module settings/loader
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import { ZodError } from 'zod';
import { settingsSchema, type Settings } from './schema.js';
import { HarnessError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('settings-loader');

/**
 * Error thrown when the settings file does not exist
 */
export class SettingsNotFoundError extends HarnessError {
  constructor(public readonly settingsPath: string) {
    super(`Settings file not found: ${settingsPath}`);
    this.name = 'SettingsNotFoundError';
  }
}

/**
 * Error thrown when the settings file has invalid YAML syntax
 */
export class SettingsParseError extends HarnessError {
  constructor(
    public readonly settingsPath: string,
    cause: Error
  ) {
    super(`Failed to parse YAML in ${settingsPath}: ${cause.message}`, { cause });
    this.name = 'SettingsParseError';
  }
}

/**
 * Error thrown when the settings file fails schema validation
 */
export class SettingsValidationError extends HarnessError {
  constructor(
    public readonly settingsPath: string,
    public readonly zodError: ZodError
  ) {
    const issues = zodError.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    super(`Settings validation failed for ${settingsPath}:\n${issues}`);
    this.name = 'SettingsValidationError';
  }
}

/**
 * Parses settings from YAML text.
 *
 * @param content - YAML document
 * @param source - Path reported in errors
 */
export function parseSettings(content: string, source = '<inline>'): Settings {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw new SettingsParseError(source, err instanceof Error ? err : new Error(String(err)));
  }

  const result = settingsSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new SettingsValidationError(source, result.error);
  }
  return result.data;
}

/**
 * Loads and validates the settings file.
 *
 * @param settingsPath - Absolute path, or relative to the working directory
 */
export async function loadSettings(settingsPath: string): Promise<Settings> {
  const resolved = path.resolve(process.cwd(), settingsPath);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new SettingsNotFoundError(resolved);
    }
    throw err;
  }

  const settings = parseSettings(content, resolved);
  logger.debug({ settingsPath: resolved }, 'Settings loaded');
  return settings;
}
