/**
 * Remote Executor contract.
 *
 * Everything the harness does on the agent host goes through this
 * interface: shell commands, and file transfer in both directions.
 */

export interface CommandResult {
  exitCode: number;
  /** stdout and stderr, interleaved */
  output: string;
  timedOut: boolean;
}

export interface ExecuteOptions {
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
  /** Abort the command early */
  signal?: AbortSignal;
}

export interface RemoteExecutor {
  /** Host the executor talks to, for log context */
  readonly host: string;

  execute(command: string, options?: ExecuteOptions): Promise<CommandResult>;

  getFile(remotePath: string, localPath: string): Promise<void>;

  putFile(localPath: string, remotePath: string): Promise<void>;

  removeFile(remotePath: string): Promise<void>;
}

/**
 * Opens executors for arbitrary hosts (the rhevm engine lookup needs one).
 */
export type ExecutorFactory = (host: {
  server: string;
  username: string;
  password: string;
  port: number;
}) => RemoteExecutor;
