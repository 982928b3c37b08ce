export interface CommandSpec {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export interface ProcessRunOptions {
  cwd?: string;
  timeoutSeconds?: number;
  /** Pass the child's stdout/stderr through to the terminal instead of capturing them. */
  inheritOutput?: boolean;
  abortSignal?: AbortSignal;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ProcessRunner {
  /** Rejects with `ToolNotFoundError` when the command does not exist. */
  run(spec: CommandSpec, options?: ProcessRunOptions): Promise<ProcessResult>;
}
