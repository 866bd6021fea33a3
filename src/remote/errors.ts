import { HarnessError } from '../utils/errors.js';

/**
 * A transfer or command that must succeed exited non-zero on the remote side.
 */
export class RemoteCommandError extends HarnessError {
  readonly host: string;
  readonly command: string;
  readonly exitCode: number;
  readonly output: string;

  constructor(host: string, command: string, exitCode: number, output: string) {
    super(`Command failed on ${host} with exit code ${exitCode}: ${command}`);
    this.name = 'RemoteCommandError';
    this.host = host;
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}
