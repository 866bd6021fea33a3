/**
 * Harness Configuration Module
 *
 * Reads tunables from environment variables with validation and defaults.
 * The resulting value is passed explicitly to the components that need it.
 */

import { z } from 'zod';
import { HarnessError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Paths
  settingsPath: z.string().min(1).default('virtwho.yaml'),
  tempDir: z.string().min(1).default('.virtwho-harness/tmp'),

  // Polling
  pollIntervalMs: z.coerce.number().int().min(0).max(300000).default(15000),
  maxPollIterations: z.coerce.number().int().min(1).max(1000).default(30),

  // Retry
  maxAttempts: z.coerce.number().int().min(1).max(20).default(4),
  backoffBaseMs: z.coerce.number().int().min(0).max(3600000).default(60000),

  // Process control
  serviceSettleMs: z.coerce.number().int().min(0).max(300000).default(10000),
  launchTimeoutMs: z.coerce.number().int().min(1000).max(86400000).default(900000),
});

export type HarnessConfig = z.infer<typeof configSchema>;

/**
 * Error thrown when the environment carries invalid settings
 */
export class ConfigurationError extends HarnessError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const raw = {
    settingsPath: env['VIRTWHO_HARNESS_SETTINGS'],
    tempDir: env['VIRTWHO_HARNESS_TEMP_DIR'],
    pollIntervalMs: env['VIRTWHO_HARNESS_POLL_INTERVAL_MS'],
    maxPollIterations: env['VIRTWHO_HARNESS_MAX_POLL_ITERATIONS'],
    maxAttempts: env['VIRTWHO_HARNESS_MAX_ATTEMPTS'],
    backoffBaseMs: env['VIRTWHO_HARNESS_BACKOFF_BASE_MS'],
    serviceSettleMs: env['VIRTWHO_HARNESS_SERVICE_SETTLE_MS'],
    launchTimeoutMs: env['VIRTWHO_HARNESS_LAUNCH_TIMEOUT_MS'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    log.error({ issues }, 'Invalid configuration');
    throw new ConfigurationError(issues);
  }

  log.debug(
    {
      settingsPath: result.data.settingsPath,
      pollIntervalMs: result.data.pollIntervalMs,
      maxPollIterations: result.data.maxPollIterations,
      maxAttempts: result.data.maxAttempts,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Defaults with no environment applied, for library callers and tests.
 */
export function defaultConfig(): HarnessConfig {
  return configSchema.parse({});
}
