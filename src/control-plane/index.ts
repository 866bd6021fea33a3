// Validators
export {
  validate,
  validateOrThrow,
  collect,
  runCommandOptionsSchema,
  analyzeCommandOptionsSchema,
  configureCommandOptionsSchema,
  type ValidationResult,
  type ValidationError,
  type RunCommandOptions,
  type AnalyzeCommandOptions,
  type ConfigureCommandOptions,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  padRight,
  formatSuccess,
  formatError,
  formatWarning,
  formatJson,
  formatMappings,
  formatAnalysis,
  print,
  printError,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createRunCommand,
  createAnalyzeCommand,
  createConfigureCommand,
} from './cli.js';
export { toCommandLineOptions } from './commands/run.js';
