/**
 * Run Loop
 *
 * Drives one end-to-end execution of the agent: stop what is running,
 * clear old logs, launch, poll, and retry while the subscription backend
 * reports transient failures. Returns the analysis of the accepted log.
 */

import { posix } from 'node:path';
import { analyze } from '../analyzer/analyzer.js';
import { ProcessController } from '../process/process-controller.js';
import type { CommandResult, RemoteExecutor } from '../remote/executor.js';
import {
  RunPhase,
  RunPhaseEvent,
  type AnalysisResult,
  type CommandLineOptions,
  type LaunchPlan,
  type RawLogText,
  type RunContext,
  type RunObservations,
  type ServiceOptions,
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { buildCommandLine } from './command-builder.js';
import { RunExhaustedError, RunInProgressError, TransientBackendError } from './errors.js';
import { LogPoller } from './log-poller.js';
import { backoffMs, classifyTransient, DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry-policy.js';
import { applyPhaseTransition, isTerminalPhase } from './state-machine.js';

const log = createLogger('run-loop');

export interface RunLoopTimings {
  pollIntervalMs: number;
  maxPollIterations: number;
  maxAttempts: number;
  backoffBaseMs: number;
  serviceSettleMs: number;
  launchTimeoutMs: number;
}

export const DEFAULT_RUN_LOOP_TIMINGS: RunLoopTimings = {
  pollIntervalMs: 15000,
  maxPollIterations: 30,
  maxAttempts: DEFAULT_RETRY_POLICY.maxAttempts,
  backoffBaseMs: DEFAULT_RETRY_POLICY.backoffBaseMs,
  serviceSettleMs: 10000,
  launchTimeoutMs: 900000,
};

export interface RunLoopOptions {
  context: RunContext;
  executor: RemoteExecutor;
  timings?: Partial<RunLoopTimings>;
  sleep?: Sleep;
}

export class RunLoop {
  readonly context: RunContext;
  readonly processes: ProcessController;
  private readonly executor: RemoteExecutor;
  private readonly poller: LogPoller;
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private phase: RunPhase = RunPhase.IDLE;
  private running = false;

  constructor(options: RunLoopOptions) {
    const timings = { ...DEFAULT_RUN_LOOP_TIMINGS, ...options.timings };
    this.context = options.context;
    this.executor = options.executor;
    this.sleep = options.sleep ?? defaultSleep;
    this.policy = { maxAttempts: timings.maxAttempts, backoffBaseMs: timings.backoffBaseMs };
    this.processes = new ProcessController(options.executor, {
      settleMs: timings.serviceSettleMs,
      launchTimeoutMs: timings.launchTimeoutMs,
      sleep: this.sleep,
    });
    this.poller = new LogPoller(options.executor, this.processes, options.context, {
      intervalMs: timings.pollIntervalMs,
      maxIterations: timings.maxPollIterations,
      sleep: this.sleep,
    });
  }

  /**
   * Current phase of the latest run.
   */
  getPhase(): RunPhase {
    return this.phase;
  }

  /**
   * Run the agent by command line and analyze the result.
   */
  async runCommandLine(options: CommandLineOptions = {}): Promise<AnalysisResult> {
    const command = buildCommandLine(options, this.context);
    return this.run({ kind: 'cli', command, waitSeconds: options.wait ?? null });
  }

  /**
   * Run the agent by restarting its service and analyze the result.
   */
  async runService(options: ServiceOptions = {}): Promise<AnalysisResult> {
    return this.run({ kind: 'service', waitSeconds: options.wait ?? null });
  }

  /**
   * Launch, poll and retry until the log is accepted.
   *
   * @throws RunExhaustedError when every attempt hit a transient failure
   * @throws ProcessCleanupError when the agent cannot be stopped
   * @throws RunInProgressError when called while another run is active
   */
  async run(plan: LaunchPlan): Promise<AnalysisResult> {
    if (this.running) {
      throw new RunInProgressError(this.executor.host);
    }
    this.running = true;
    this.phase = RunPhase.IDLE;

    try {
      let lastFailure: TransientBackendError | null = null;

      for (let attempt = 0; attempt < this.policy.maxAttempts; attempt++) {
        this.transition(RunPhaseEvent.ATTEMPT_STARTED);
        log.info({ attempt: attempt + 1, kind: plan.kind }, 'Starting virt-who attempt');

        const raw = await this.attempt(plan);
        const reason = classifyTransient(raw.log);
        if (reason === null) {
          this.transition(RunPhaseEvent.LOG_ACCEPTED);
          const observations = await this.observe();
          return analyze(raw.log, this.context, observations);
        }

        lastFailure = new TransientBackendError(reason, attempt, backoffMs(reason, attempt, this.policy));
        if (attempt + 1 >= this.policy.maxAttempts) {
          break;
        }

        this.transition(RunPhaseEvent.TRANSIENT_FAILURE);
        log.warn(
          { attempt: attempt + 1, reason, backoffMs: lastFailure.backoffMs },
          reason === 'rate_limited'
            ? '429 code found, try again after backoff'
            : 'RemoteServerException return 500 code, restart virt-who again after backoff'
        );
        await this.sleep(lastFailure.backoffMs);
      }

      this.transition(RunPhaseEvent.ATTEMPTS_EXHAUSTED);
      log.error({ attempts: this.policy.maxAttempts, reason: lastFailure?.reason }, 'Failed to run virt-who');
      throw new RunExhaustedError(this.policy.maxAttempts, lastFailure);
    } catch (error) {
      if (!isTerminalPhase(this.phase)) {
        this.transition(RunPhaseEvent.SYSTEM_ERROR);
      }
      throw error;
    } finally {
      this.running = false;
    }
  }

  /**
   * One launch and polling cycle.
   */
  private async attempt(plan: LaunchPlan): Promise<RawLogText> {
    await this.processes.stop();
    await this.cleanLogs();

    const captured: { output: string | null } = { output: null };
    const launch = new AbortController();
    void this.launch(plan, launch.signal).then(
      (result) => {
        captured.output = result.output;
        log.debug({ kind: plan.kind, exitCode: result.exitCode, timedOut: result.timedOut }, 'Launch finished');
      },
      (error: unknown) => {
        log.warn({ kind: plan.kind, error: errorMessage(error) }, 'Launch failed');
      }
    );
    this.transition(RunPhaseEvent.AGENT_LAUNCHED);

    try {
      const outcome = await this.poller.poll(plan.waitSeconds);
      log.info({ exit: outcome.exit, iterations: outcome.iterations }, 'Polling finished');
      return { log: outcome.log, launchOutput: captured.output };
    } finally {
      // A daemon-mode agent never exits on its own
      launch.abort();
    }
  }

  private launch(plan: LaunchPlan, signal: AbortSignal): Promise<CommandResult> {
    return plan.kind === 'cli'
      ? this.processes.startCommandLine(plan.command, signal)
      : this.processes.startService();
  }

  /**
   * Remove every log under the log directory and the print output.
   */
  private async cleanLogs(): Promise<void> {
    const logDir = posix.dirname(this.context.logFile);
    await this.executor.execute(`rm -rf ${logDir}/*`);
    await this.executor.execute(`rm -rf ${this.context.printFile}`);
  }

  /**
   * Host facts the analyzer cannot get from the log.
   */
  private async observe(): Promise<RunObservations> {
    const threadCount = await this.processes.countRunning();
    const { exitCode, output } = await this.executor.execute(`cat ${this.context.printFile}`);
    return {
      threadCount,
      printOutput: exitCode === 0 && output !== '' ? output : null,
    };
  }

  private transition(event: RunPhaseEvent): void {
    this.phase = applyPhaseTransition(this.phase, event);
  }
}

export function createRunLoop(options: RunLoopOptions): RunLoop {
  return new RunLoop(options);
}
