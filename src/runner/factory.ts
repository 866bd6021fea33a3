/**
 * Wires a run loop from the settings file and environment configuration.
 */

import type { HarnessConfig } from '../config/index.js';
import { createSshExecutor } from '../remote/ssh-executor.js';
import type { ExecutorFactory } from '../remote/executor.js';
import type { SettingsResolver } from '../settings/resolver.js';
import { createRunContext, type HypervisorMode, type RegisterBackend } from '../types/index.js';
import { RunLoop } from './run-loop.js';

export interface ConnectOptions {
  mode: HypervisorMode;
  registerBackend: RegisterBackend;
  settings: SettingsResolver;
  config: HarnessConfig;
  /** Defaults to SSH */
  connect?: ExecutorFactory;
}

export function connectRunLoop(options: ConnectOptions): RunLoop {
  const { mode, registerBackend, settings, config } = options;
  const connect = options.connect ?? createSshExecutor;
  const executor = connect(settings.getAgentHost(mode));

  return new RunLoop({
    context: createRunContext(mode, registerBackend, {
      selfGuestId: settings.getSelfGuestId(mode),
    }),
    executor,
    timings: {
      pollIntervalMs: config.pollIntervalMs,
      maxPollIterations: config.maxPollIterations,
      maxAttempts: config.maxAttempts,
      backoffBaseMs: config.backoffBaseMs,
      serviceSettleMs: config.serviceSettleMs,
      launchTimeoutMs: config.launchTimeoutMs,
    },
  });
}
