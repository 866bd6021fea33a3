import { Command } from 'commander';
import { connectRunLoop } from '../../runner/index.js';
import {
  HYPERVISOR_MODES,
  REGISTER_BACKENDS,
  type AnalysisResult,
  type CommandLineOptions,
} from '../../types/index.js';
import {
  print,
  printError,
  formatError,
  formatSuccess,
  formatWarning,
  formatAnalysis,
  formatJson,
  bold,
  cyan,
  dim,
} from '../formatter.js';
import { openSession } from '../session.js';
import { runCommandOptionsSchema, validateOrThrow, type RunCommandOptions } from '../validators.js';

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Launch virt-who on the agent host, wait for its report and analyze the log')
    .requiredOption('-m, --mode <mode>', `Hypervisor mode (${HYPERVISOR_MODES.join(', ')})`)
    .option('-r, --register <backend>', `Subscription backend (${REGISTER_BACKENDS.join(', ')})`, 'rhsm')
    .option('--service', 'Restart the virt-who service instead of running the command line', false)
    .option('--no-debug', 'Run without -d')
    .option('--no-oneshot', 'Run without -o')
    .option('-i, --interval <seconds>', 'Reporting interval passed as -i')
    .option('-p, --print', 'Pass -p and capture the printed mapping', false)
    .option('-c, --config <path>', 'Configuration file passed as -c (default: the mode config)')
    .option('--no-config', 'Run without -c')
    .option('-w, --wait <seconds>', 'Seconds to wait before polling the log')
    .option('--settings <path>', 'Settings file (default: $VIRTWHO_HARNESS_SETTINGS)')
    .option('--json', 'Output result as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeRun(validateOrThrow(runCommandOptionsSchema, options));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Map parsed flags onto the command line options of the runner.
 */
export function toCommandLineOptions(options: RunCommandOptions): CommandLineOptions {
  return {
    debug: options.debug,
    oneshot: options.oneshot,
    interval: options.interval ?? null,
    print: options.print,
    config: options.config === false ? null : (options.config ?? 'default'),
    wait: options.wait ?? null,
  };
}

async function executeRun(options: RunCommandOptions): Promise<void> {
  const { config, settings } = await openSession(options.settings);
  const runner = connectRunLoop({
    mode: options.mode,
    registerBackend: options.register,
    settings,
    config,
  });

  if (!options.json) {
    print(bold('Running virt-who'));
    print('');
    print(`${bold('Host:')}     ${cyan(settings.getAgentHost(options.mode).server)}`);
    print(`${bold('Mode:')}     ${options.mode}`);
    print(`${bold('Register:')} ${options.register}`);
    print(`${bold('Launch:')}   ${options.service ? 'service' : 'command line'}`);
    print('');
    print(dim('Waiting for the report...'));
    print('');
  }

  const result: AnalysisResult = options.service
    ? await runner.runService({ wait: options.wait ?? null })
    : await runner.runCommandLine(toCommandLineOptions(options));

  if (options.json) {
    print(formatJson(result));
    return;
  }

  if (result.sendCount > 0) {
    print(formatSuccess(`Mapping sent ${result.sendCount} time(s)`));
  } else {
    print(formatWarning('No mapping report found in the log'));
  }
  print('');
  print(formatAnalysis(result));
}
