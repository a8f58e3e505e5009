/**
 * Request to run a foreground command on the host.
 */
export type CommandRequest = {
  /** Executable name or path (e.g., apt-get) */
  file: string;
  /** Command arguments */
  args: string[];
  /** Run through sudo when the process is not already root */
  sudo?: boolean;
  /** Text written to stdin. Stdin is closed empty when absent. */
  input?: string;
  /** Working directory */
  cwd?: string;
  /** Extra environment variables, merged over the current environment */
  env?: Record<string, string>;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Outcome of a foreground command.
 */
export type CommandResult = {
  /** Display form of the command, as passed to errors and logs */
  command: string;
  exitCode: number;
  /** Captured stdout, lines joined with \n */
  stdout: string;
  /** Captured stderr, lines joined with \n */
  stderr: string;
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Request to start a long-running process in the background.
 *
 * The process is detached from the current process group and both of its
 * output streams are redirected to `logFile`, which is truncated first.
 */
export type BackgroundRequest = {
  file: string;
  args: string[];
  logFile: string;
  env?: Record<string, string>;
}

/** How a process ended. */
export type ProcessExit = {
  exitCode?: number;
  signal?: string;
}
