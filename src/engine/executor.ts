import type {BackgroundRequest, CommandRequest, CommandResult} from './types.js'
import type {BackgroundProcess} from './background-process.js'

/**
 * Log line from command execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during command execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running commands on the provisioned host.
 *
 * Implementations:
 * - `ExecaHostExecutor`: spawns real processes through execa
 * - Tests use an in-process fake that answers from scripted handlers
 *
 * The executor is responsible for:
 * - Prefixing privileged commands with sudo where needed
 * - Streaming output line by line while also buffering it
 * - Turning launch failures and timeouts into typed errors
 *
 * A non-zero exit code is not an error at this level: it is returned in the
 * result and the caller decides what it means.
 */
export abstract class HostExecutor {
  /**
   * Runs a command to completion.
   * @param onLogLine - Callback for real-time stdout/stderr lines
   * @throws CommandLaunchError if the executable cannot be started
   * @throws CommandTimeoutError if `timeoutMs` elapses first
   */
  abstract run(request: CommandRequest, onLogLine?: OnLogLine): Promise<CommandResult>

  /**
   * Starts a supervised background process.
   * The returned handle owns the process: callers must either stop() or detach() it.
   */
  abstract spawn(request: BackgroundRequest): BackgroundProcess
}

/**
 * Renders a command for display, quoting arguments that need it.
 */
export function formatCommand(request: Pick<CommandRequest, 'file' | 'args' | 'sudo'>): string {
  const parts = [request.file, ...request.args].map(part => {
    if (part === '') {
      return '""'
    }

    return /[\s"'$`\\]/.test(part) ? JSON.stringify(part) : part
  })

  return request.sudo ? ['sudo', ...parts].join(' ') : parts.join(' ')
}
