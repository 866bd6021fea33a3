import { HarnessError } from '../utils/errors.js';

/**
 * The agent could not be confirmed stopped after a forced kill.
 */
export class ProcessCleanupError extends HarnessError {
  readonly processName: string;
  readonly remaining: string;

  constructor(processName: string, remaining: string) {
    super(`Failed to stop and clean ${processName} process`);
    this.name = 'ProcessCleanupError';
    this.processName = processName;
    this.remaining = remaining;
  }
}
