/**
 * State machine for one run of the agent.
 * Manages the launch-poll-retry cycle; a run ends succeeded or failed.
 */

import { RunPhase, RunPhaseEvent } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('run-state-machine');

/**
 * State transition table.
 * Maps (current phase, event) -> next phase
 */
const transitions: Record<RunPhase, Partial<Record<RunPhaseEvent, RunPhase>>> = {
  [RunPhase.IDLE]: {
    [RunPhaseEvent.ATTEMPT_STARTED]: RunPhase.LAUNCHING,
    [RunPhaseEvent.SYSTEM_ERROR]: RunPhase.FAILED,
  },
  [RunPhase.LAUNCHING]: {
    [RunPhaseEvent.AGENT_LAUNCHED]: RunPhase.POLLING,
    [RunPhaseEvent.SYSTEM_ERROR]: RunPhase.FAILED,
  },
  [RunPhase.POLLING]: {
    [RunPhaseEvent.TRANSIENT_FAILURE]: RunPhase.RETRY_BACKOFF,
    [RunPhaseEvent.LOG_ACCEPTED]: RunPhase.SUCCEEDED,
    [RunPhaseEvent.ATTEMPTS_EXHAUSTED]: RunPhase.FAILED,
    [RunPhaseEvent.SYSTEM_ERROR]: RunPhase.FAILED,
  },
  [RunPhase.RETRY_BACKOFF]: {
    [RunPhaseEvent.ATTEMPT_STARTED]: RunPhase.LAUNCHING,
    [RunPhaseEvent.SYSTEM_ERROR]: RunPhase.FAILED,
  },
  // Terminal phases - no transitions out
  [RunPhase.SUCCEEDED]: {},
  [RunPhase.FAILED]: {},
};

export function isTerminalPhase(phase: RunPhase): boolean {
  return phase === RunPhase.SUCCEEDED || phase === RunPhase.FAILED;
}

/**
 * Get the next phase for a given transition.
 * Returns null if the transition is invalid.
 */
export function getNextPhase(current: RunPhase, event: RunPhaseEvent): RunPhase | null {
  return transitions[current][event] ?? null;
}

/**
 * Apply a transition, throwing if the table does not allow it.
 */
export function applyPhaseTransition(current: RunPhase, event: RunPhaseEvent): RunPhase {
  const next = getNextPhase(current, event);
  if (next === null) {
    const error = `Invalid transition: ${current} + ${event}`;
    log.error({ current, event }, error);
    throw new Error(error);
  }
  log.debug({ from: current, event, to: next }, 'Run phase transition');
  return next;
}
