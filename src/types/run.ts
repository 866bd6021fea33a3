import type { HypervisorMode, RegisterBackend } from './mode.js';

/**
 * Per-harness parameters, fixed for the lifetime of a runner.
 */
export interface RunContext {
  readonly mode: HypervisorMode;
  readonly registerBackend: RegisterBackend;
  /** Agent configuration file on the remote host */
  readonly configFile: string;
  /** Application log polled and analyzed after each launch */
  readonly logFile: string;
  /** File receiving the agent's `-p` output */
  readonly printFile: string;
  /** Guest uuid whose owning hypervisor is reported as hypervisorId */
  readonly selfGuestId: string;
}

export const DEFAULT_LOG_FILE = '/var/log/rhsm/rhsm.log';
export const DEFAULT_PRINT_FILE = '/root/print.json';
export const GLOBAL_CONFIG_FILE = '/etc/virt-who.conf';

export function hypervisorConfigPath(mode: HypervisorMode): string {
  return `/etc/virt-who.d/${mode}.conf`;
}

export function createRunContext(
  mode: HypervisorMode,
  registerBackend: RegisterBackend,
  overrides: Partial<Omit<RunContext, 'mode' | 'registerBackend'>> = {}
): RunContext {
  return Object.freeze({
    mode,
    registerBackend,
    configFile: overrides.configFile ?? hypervisorConfigPath(mode),
    logFile: overrides.logFile ?? DEFAULT_LOG_FILE,
    printFile: overrides.printFile ?? DEFAULT_PRINT_FILE,
    selfGuestId: overrides.selfGuestId ?? '',
  });
}

/**
 * Command line flags for a `virt-who` invocation.
 */
export interface CommandLineOptions {
  /** `-d` (default true) */
  debug?: boolean;
  /** `-o` (default true) */
  oneshot?: boolean;
  /** `-i <seconds>` */
  interval?: number | null;
  /** `-p`, redirected to the print file (default false) */
  print?: boolean;
  /** `-c <file>`; 'default' means the context config file, null omits the flag */
  config?: string | null;
  /** Seconds to wait after launch before polling starts */
  wait?: number | null;
}

export interface ServiceOptions {
  wait?: number | null;
}

export type LaunchPlan =
  | { kind: 'cli'; command: string; waitSeconds: number | null }
  | { kind: 'service'; waitSeconds: number | null };

/**
 * Log snapshot handed from the run loop to the analyzer.
 */
export interface RawLogText {
  readonly log: string;
  /** Output of the launch command, when it finished before polling did */
  readonly launchOutput: string | null;
}

/**
 * Facts gathered from the remote host once polling has finished.
 */
export interface RunObservations {
  threadCount: number;
  printOutput: string | null;
}

// Run Loop phases
export const RunPhase = {
  IDLE: 'idle',
  LAUNCHING: 'launching',
  POLLING: 'polling',
  RETRY_BACKOFF: 'retry_backoff',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
} as const;

export type RunPhase = (typeof RunPhase)[keyof typeof RunPhase];

// Run Loop events
export const RunPhaseEvent = {
  ATTEMPT_STARTED: 'attempt_started',
  AGENT_LAUNCHED: 'agent_launched',
  TRANSIENT_FAILURE: 'transient_failure',
  LOG_ACCEPTED: 'log_accepted',
  ATTEMPTS_EXHAUSTED: 'attempts_exhausted',
  SYSTEM_ERROR: 'system_error',
} as const;

export type RunPhaseEvent = (typeof RunPhaseEvent)[keyof typeof RunPhaseEvent];

// Why a polling cycle ended
export const PollExit = {
  RATE_LIMITED: 'rate_limited',
  TERMINATED: 'terminated',
  ERROR_LOGGED: 'error_logged',
  MAPPING_SENT: 'mapping_sent',
  TIMEOUT: 'timeout',
} as const;

export type PollExit = (typeof PollExit)[keyof typeof PollExit];

export interface PollOutcome {
  log: string;
  exit: PollExit;
  iterations: number;
}

export type TransientReason = 'rate_limited' | 'server_error';
