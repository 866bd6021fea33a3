/**
 * SSH-backed Remote Executor.
 *
 * Shells out to the system `ssh` and `scp` clients. Password logins go
 * through `sshpass -e` so the secret never shows up in the process list.
 */

import { execa } from 'execa';
import type { CommandResult, ExecuteOptions, ExecutorFactory, RemoteExecutor } from './executor.js';
import { RemoteCommandError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ssh-executor');

export interface SshTarget {
  server: string;
  username: string;
  password: string;
  port: number;
}

export interface SshExecutorOptions {
  /** ssh ConnectTimeout in seconds (default: 30) */
  connectTimeoutSeconds?: number;
  /** Timeout for scp transfers in milliseconds (default: 120000) */
  transferTimeoutMs?: number;
}

interface Invocation {
  file: string;
  args: string[];
  env: Record<string, string>;
}

export class SshExecutor implements RemoteExecutor {
  readonly host: string;
  private readonly target: SshTarget;
  private readonly connectTimeoutSeconds: number;
  private readonly transferTimeoutMs: number;

  constructor(target: SshTarget, options: SshExecutorOptions = {}) {
    this.target = target;
    this.host = target.server;
    this.connectTimeoutSeconds = options.connectTimeoutSeconds ?? 30;
    this.transferTimeoutMs = options.transferTimeoutMs ?? 120000;
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const invocation = this.wrap('ssh', [
      '-p',
      String(this.target.port),
      ...this.commonOptions(),
      `${this.target.username}@${this.target.server}`,
      command,
    ]);

    log.debug({ host: this.host, command }, 'Running remote command');
    const result = await this.run(invocation, options);
    log.debug({ host: this.host, command, exitCode: result.exitCode }, 'Remote command finished');
    return result;
  }

  async getFile(remotePath: string, localPath: string): Promise<void> {
    await this.transfer(`${this.remoteSpec()}:${remotePath}`, localPath);
  }

  async putFile(localPath: string, remotePath: string): Promise<void> {
    await this.transfer(localPath, `${this.remoteSpec()}:${remotePath}`);
  }

  async removeFile(remotePath: string): Promise<void> {
    await this.execute(`rm -f ${remotePath}`);
  }

  private async transfer(source: string, destination: string): Promise<void> {
    const invocation = this.wrap('scp', [
      '-P',
      String(this.target.port),
      ...this.commonOptions(),
      source,
      destination,
    ]);

    const result = await this.run(invocation, { timeoutMs: this.transferTimeoutMs });
    if (result.exitCode !== 0) {
      throw new RemoteCommandError(
        this.host,
        `scp ${source} ${destination}`,
        result.exitCode,
        result.output
      );
    }
    log.debug({ host: this.host, source, destination }, 'File transferred');
  }

  private async run(invocation: Invocation, options: ExecuteOptions): Promise<CommandResult> {
    const result = await execa(invocation.file, invocation.args, {
      reject: false,
      all: true,
      env: invocation.env,
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
    });

    return {
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : -1,
      output: result.all ?? '',
      timedOut: result.timedOut,
    };
  }

  private wrap(binary: 'ssh' | 'scp', args: string[]): Invocation {
    if (this.target.password) {
      return {
        file: 'sshpass',
        args: ['-e', binary, ...args],
        env: { SSHPASS: this.target.password },
      };
    }
    return { file: binary, args: ['-o', 'BatchMode=yes', ...args], env: {} };
  }

  private commonOptions(): string[] {
    return [
      '-o',
      'StrictHostKeyChecking=no',
      '-o',
      'UserKnownHostsFile=/dev/null',
      '-o',
      'LogLevel=ERROR',
      '-o',
      `ConnectTimeout=${this.connectTimeoutSeconds}`,
    ];
  }

  private remoteSpec(): string {
    return `${this.target.username}@${this.target.server}`;
  }
}

export const createSshExecutor: ExecutorFactory = (host) => new SshExecutor(host);
