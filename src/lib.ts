/**
 * virtwho-harness Library API
 *
 * Exports the public modules for programmatic usage.
 */

// Types
export * from './types/index.js';

// Run Loop (main entry point)
export {
  RunLoop,
  createRunLoop,
  connectRunLoop,
  buildCommandLine,
  RunExhaustedError,
  RunInProgressError,
  TransientBackendError,
  type RunLoopOptions,
  type RunLoopTimings,
  type ConnectOptions,
} from './runner/index.js';

// Log Analyzer
export {
  analyze,
  messageCount,
  messageSearch,
  type AnalysisContext,
} from './analyzer/index.js';

// Configuration Builders
export { HypervisorConfig, GlobalConfig } from './configure/index.js';
export { ConfigFile } from './config-store/index.js';

// Process Control
export { ProcessController, ProcessCleanupError } from './process/index.js';

// Remote Execution
export * as remote from './remote/index.js';

// Settings
export * as settings from './settings/index.js';

// Environment configuration
export { loadConfig, defaultConfig, ConfigurationError, type HarnessConfig } from './config/index.js';

// Control Plane
export * as controlPlane from './control-plane/index.js';

// Utilities
export { createLogger, logger } from './utils/logger.js';
export { HarnessError } from './utils/errors.js';
