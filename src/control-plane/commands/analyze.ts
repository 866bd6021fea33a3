import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { analyze } from '../../analyzer/index.js';
import { HYPERVISOR_MODES, REGISTER_BACKENDS } from '../../types/index.js';
import { print, printError, formatError, formatAnalysis, formatJson } from '../formatter.js';
import {
  analyzeCommandOptionsSchema,
  validateOrThrow,
  type AnalyzeCommandOptions,
} from '../validators.js';

/**
 * Create the analyze command.
 */
export function createAnalyzeCommand(): Command {
  const command = new Command('analyze')
    .description('Analyze a saved rhsm.log without touching any host')
    .argument('<log-file>', 'Path of the log file')
    .requiredOption('-m, --mode <mode>', `Hypervisor mode the log was produced in (${HYPERVISOR_MODES.join(', ')})`)
    .option('-r, --register <backend>', `Subscription backend (${REGISTER_BACKENDS.join(', ')})`, 'rhsm')
    .option('--self-guest <uuid>', 'Guest uuid to look up in the mappings', '')
    .option('--json', 'Output result as JSON', false)
    .action(async (logFile: string, options: Record<string, unknown>) => {
      try {
        await executeAnalyze(logFile, validateOrThrow(analyzeCommandOptionsSchema, options));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeAnalyze(logFile: string, options: AnalyzeCommandOptions): Promise<void> {
  const text = await readFile(logFile, 'utf-8');
  const result = analyze(text, {
    mode: options.mode,
    registerBackend: options.register,
    selfGuestId: options.selfGuest,
  });

  print(options.json ? formatJson(result) : formatAnalysis(result));
}
