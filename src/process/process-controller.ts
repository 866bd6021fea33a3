/**
 * Process Controller
 *
 * Starts and stops the agent on the remote host, either as a plain command
 * line or through its systemd unit, and answers how many instances run.
 */

import type { CommandResult, RemoteExecutor } from '../remote/executor.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { createLogger } from '../utils/logger.js';
import { ProcessCleanupError } from './errors.js';

const log = createLogger('process-controller');

export const AGENT_PROCESS_NAME = 'virt-who';

export type ServiceAction = 'start' | 'stop' | 'restart' | 'status' | 'enable' | 'disable';

export interface ProcessControllerOptions {
  /** Wait after every systemctl action in milliseconds (default: 10000) */
  settleMs?: number;
  /** Lifetime bound for a command line launch in milliseconds */
  launchTimeoutMs?: number;
  sleep?: Sleep;
}

export class ProcessController {
  private readonly executor: RemoteExecutor;
  private readonly settleMs: number;
  private readonly launchTimeoutMs: number | undefined;
  private readonly sleep: Sleep;

  constructor(executor: RemoteExecutor, options: ProcessControllerOptions = {}) {
    this.executor = executor;
    this.settleMs = options.settleMs ?? 10000;
    this.launchTimeoutMs = options.launchTimeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Stop the service, then kill whatever is left of the agent.
   *
   * @throws ProcessCleanupError when a matching process survives
   */
  async stop(): Promise<void> {
    await this.operateService('stop');
    const remaining = await this.killByName(AGENT_PROCESS_NAME);
    if (remaining !== '') {
      log.error({ host: this.executor.host, remaining }, 'Agent process still running after kill');
      throw new ProcessCleanupError(AGENT_PROCESS_NAME, remaining);
    }
  }

  /**
   * Launch the agent by command line. The returned promise settles when the
   * command exits; callers are not expected to wait for it.
   */
  startCommandLine(cli: string, signal?: AbortSignal): Promise<CommandResult> {
    log.info({ host: this.executor.host, cli }, 'Start to run virt-who by cli');
    return this.executor.execute(cli, {
      ...(this.launchTimeoutMs !== undefined ? { timeoutMs: this.launchTimeoutMs } : {}),
      ...(signal !== undefined ? { signal } : {}),
    });
  }

  /**
   * Launch the agent by restarting its service.
   */
  async startService(): Promise<CommandResult> {
    log.info({ host: this.executor.host }, 'Start to run virt-who by service');
    return this.operateService('restart');
  }

  /**
   * Run a systemctl action and give the unit time to settle.
   */
  async operateService(action: ServiceAction, name = AGENT_PROCESS_NAME): Promise<CommandResult> {
    const result = await this.executor.execute(`systemctl ${action} ${name}`);
    log.debug({ host: this.executor.host, action, name, exitCode: result.exitCode }, 'Service action issued');
    await this.sleep(this.settleMs);
    return result;
  }

  /**
   * Number of processes whose command line mentions the agent.
   */
  async countRunning(): Promise<number> {
    const { output } = await this.executor.execute(
      `ps -ef | grep ${AGENT_PROCESS_NAME} -i | grep -v grep | wc -l`
    );
    const count = Number.parseInt(output.trim(), 10);
    return Number.isNaN(count) ? 0 : count;
  }

  /**
   * Force-kill every process matching the name and remove its pid file.
   *
   * @returns the `ps` lines still matching afterwards, empty when clean
   */
  async killByName(processName: string): Promise<string> {
    await this.executor.execute(
      `ps -ef | grep ${processName} -i | grep -v grep | awk '{print $2}' | xargs -I {} kill -9 {}`
    );
    await this.executor.execute(`rm -f /var/run/${processName}.pid`);
    const { output } = await this.executor.execute(
      `ps -ef | grep ${processName} -i | grep -v grep | sort`
    );
    return output.trim();
  }
}
