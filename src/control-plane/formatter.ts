import type { AnalysisResult, Mappings } from '../types/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  // Respect FORCE_COLOR environment variable
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function padRight(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Summarize mappings as one line per organization or guest.
 */
export function formatMappings(mappings: Mappings): string[] {
  if (mappings.kind === 'local') {
    return Object.entries(mappings.guests).map(
      ([guestId, guest]) => `  ${guestId} ${dim(`state=${guest.state} active=${guest.active} type=${guest.type}`)}`
    );
  }
  return mappings.orgs.map((org) => {
    const mapping = mappings.organizations[org];
    const hypervisors = mapping ? Object.keys(mapping.hypervisors).length : 0;
    const guests = mapping ? Object.keys(mapping.guests).length : 0;
    return `  ${org} ${dim(`hypervisors=${hypervisors} guests=${guests}`)}`;
  });
}

/**
 * Human-readable analysis summary.
 */
export function formatAnalysis(result: AnalysisResult): string {
  const rows: Array<[string, string]> = [
    ['Debug', String(result.debug)],
    ['Oneshot', String(result.oneshot)],
    ['Terminated', String(result.terminated)],
    ['Threads', String(result.threadCount)],
    ['Sends', result.sendCount > 0 ? green(String(result.sendCount)) : yellow('0')],
    ['Reporter ID', result.reporterId ?? dim('-')],
    ['Interval', result.intervalSeconds === null ? dim('-') : `${result.intervalSeconds}s`],
    ['Loops', String(result.loopCount)],
    ['Loop interval', result.loopIntervalSeconds < 0 ? dim('-') : `${result.loopIntervalSeconds}s`],
    ['Hypervisor ID', result.hypervisorId || dim('-')],
    ['Errors', result.errorCount > 0 ? red(String(result.errorCount)) : '0'],
    ['Warnings', result.warningCount > 0 ? yellow(String(result.warningCount)) : '0'],
  ];

  const lines = rows.map(([label, value]) => `${bold(padRight(label, 14))} ${value}`);

  const mappingLines = formatMappings(result.mappings);
  if (mappingLines.length > 0) {
    lines.push('', bold(result.mappings.kind === 'local' ? 'Guests' : 'Organizations'), ...mappingLines);
  }
  if (result.errorLines.length > 0) {
    lines.push('', bold('Error lines'), ...result.errorLines.map((line) => `  ${red(line)}`));
  }
  if (result.warningLines.length > 0) {
    lines.push('', bold('Warning lines'), ...result.warningLines.map((line) => `  ${yellow(line)}`));
  }
  return lines.join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
