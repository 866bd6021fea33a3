import { Command } from 'commander';
import { HypervisorConfig } from '../../configure/index.js';
import { createSshExecutor } from '../../remote/index.js';
import { HYPERVISOR_MODES, REGISTER_BACKENDS } from '../../types/index.js';
import { print, printError, formatError, formatSuccess, formatJson, dim } from '../formatter.js';
import { openSession } from '../session.js';
import {
  collect,
  configureCommandOptionsSchema,
  validateOrThrow,
  type ConfigureCommandOptions,
} from '../validators.js';

/**
 * Create the configure command.
 */
export function createConfigureCommand(): Command {
  const command = new Command('configure')
    .description('Write /etc/virt-who.d/<mode>.conf on the agent host from the settings file')
    .requiredOption('-m, --mode <mode>', `Hypervisor mode (${HYPERVISOR_MODES.join(', ')})`)
    .option('-r, --register <backend>', `Subscription backend (${REGISTER_BACKENDS.join(', ')})`, 'rhsm')
    .option('--set <key=value>', 'Add or override an option (repeatable)', collect, [])
    .option('--unset <key>', 'Remove an option (repeatable)', collect, [])
    .option('--settings <path>', 'Settings file (default: $VIRTWHO_HARNESS_SETTINGS)')
    .option('--json', 'Output the written sections as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeConfigure(validateOrThrow(configureCommandOptionsSchema, options));
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeConfigure(options: ConfigureCommandOptions): Promise<void> {
  const { config, settings } = await openSession(options.settings);
  const hypervisor = new HypervisorConfig({
    mode: options.mode,
    registerBackend: options.register,
    settings,
    executor: createSshExecutor(settings.getAgentHost(options.mode)),
    connect: createSshExecutor,
    tempDir: config.tempDir,
  });

  await hypervisor.create();
  for (const { key, value } of options.set) {
    await hypervisor.update(key, value);
  }
  for (const key of options.unset) {
    await hypervisor.delete(key);
  }

  if (options.json) {
    print(formatJson(hypervisor.file.toJSON()));
    return;
  }
  print(formatSuccess(`Wrote ${hypervisor.file.remotePath}`));
  print('');
  print(dim(hypervisor.file.render().trimEnd()));
}
