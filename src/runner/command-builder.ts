import type { CommandLineOptions, RunContext } from '../types/index.js';

/**
 * Render the `virt-who` command line for a run.
 * Flags keep the fixed order -d -o -i -p -c; printing redirects stdout to
 * the print file.
 */
export function buildCommandLine(
  options: CommandLineOptions,
  context: Pick<RunContext, 'configFile' | 'printFile'>
): string {
  const args = ['virt-who'];
  if (options.debug ?? true) {
    args.push('-d');
  }
  if (options.oneshot ?? true) {
    args.push('-o');
  }
  if (options.interval) {
    args.push('-i', String(options.interval));
  }
  if (options.print) {
    args.push('-p');
  }

  const config = options.config === undefined ? 'default' : options.config;
  if (config) {
    args.push('-c', config === 'default' ? context.configFile : config);
  }

  const command = args.join(' ');
  return options.print ? `${command} > ${context.printFile}` : command;
}
