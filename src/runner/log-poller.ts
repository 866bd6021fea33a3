/**
 * Log Poller
 *
 * Re-reads the remote log on a fixed interval until the agent has produced
 * enough to judge the run: it was throttled, exited, logged an error or
 * sent a report. Gives up after a fixed number of reads.
 */

import { messageSearch } from '../analyzer/message-search.js';
import { LOG_MARKERS } from '../analyzer/patterns.js';
import { sendCount } from '../analyzer/send-count.js';
import type { ProcessController } from '../process/process-controller.js';
import type { RemoteExecutor } from '../remote/executor.js';
import { PollExit, type PollOutcome, type RunContext } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

const log = createLogger('log-poller');

export interface LogPollerOptions {
  /** Wait before each read in milliseconds (default: 15000) */
  intervalMs?: number;
  /** Reads before giving up (default: 30) */
  maxIterations?: number;
  sleep?: Sleep;
}

export class LogPoller {
  private readonly intervalMs: number;
  private readonly maxIterations: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly executor: RemoteExecutor,
    private readonly processes: ProcessController,
    private readonly context: RunContext,
    options: LogPollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 15000;
    this.maxIterations = options.maxIterations ?? 30;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Poll until a terminal condition or the iteration cap.
   *
   * @param waitSeconds - Extra delay before the first read
   */
  async poll(waitSeconds: number | null = null): Promise<PollOutcome> {
    if (waitSeconds) {
      log.debug({ waitSeconds }, 'Waiting before polling the log');
      await this.sleep(waitSeconds * 1000);
    }

    let text = '';
    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      await this.sleep(this.intervalMs);
      text = await this.fetchLog();

      const exit = await this.evaluate(text);
      if (exit !== null) {
        return { log: text, exit, iterations: iteration };
      }
    }

    log.info({ iterations: this.maxIterations }, 'Timeout when run virt-who');
    return { log: text, exit: PollExit.TIMEOUT, iterations: this.maxIterations };
  }

  /**
   * Check the terminal conditions in priority order.
   */
  async evaluate(text: string): Promise<PollExit | null> {
    if (messageSearch(text, LOG_MARKERS.RATE_LIMITED)) {
      log.warn('429 code found when run virt-who');
      return PollExit.RATE_LIMITED;
    }
    if ((await this.processes.countRunning()) === 0) {
      log.info('Virt-who is terminated after run once');
      return PollExit.TERMINATED;
    }
    if (messageSearch(text, LOG_MARKERS.ERROR)) {
      log.info('Error found when run virt-who');
      return PollExit.ERROR_LOGGED;
    }
    if (sendCount(text, this.context.registerBackend, this.context.mode) > 0) {
      log.info('Succeed to send mapping after run virt-who');
      return PollExit.MAPPING_SENT;
    }
    return null;
  }

  async fetchLog(): Promise<string> {
    const { output } = await this.executor.execute(`cat ${this.context.logFile}`);
    return output;
  }
}
