import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createConfigureCommand } from './commands/configure.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('virtwho-harness')
    .description('Run virt-who on a remote host and turn its log into assertable facts')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createRunCommand());
  program.addCommand(createAnalyzeCommand());
  program.addCommand(createConfigureCommand());

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createRunCommand } from './commands/run.js';
export { createAnalyzeCommand } from './commands/analyze.js';
export { createConfigureCommand } from './commands/configure.js';
