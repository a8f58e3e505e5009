import process from 'node:process'
import {execa} from 'execa'
import {CommandLaunchError, CommandTimeoutError, GroundworkError} from '../errors.js'
import type {BackgroundRequest, CommandRequest, CommandResult} from './types.js'
import {HostExecutor, formatCommand, type OnLogLine} from './executor.js'
import {BackgroundProcess} from './background-process.js'

// `exec` keeps the pid: the shell is replaced by the command it redirects
const REDIRECT_SCRIPT = 'log="$1"; shift; exec "$@" >"$log" 2>&1'

function isRoot(): boolean {
  return process.getuid?.() === 0
}

export class ExecaHostExecutor extends HostExecutor {
  private readonly useSudo: boolean

  /**
   * @param options.sudo - Force sudo on or off for privileged commands (default: on unless running as root)
   */
  constructor(options?: {sudo?: boolean}) {
    super()
    this.useSudo = options?.sudo ?? !isRoot()
  }

  async run(request: CommandRequest, onLogLine?: OnLogLine): Promise<CommandResult> {
    const sudo = Boolean(request.sudo) && this.useSudo
    const command = formatCommand({...request, sudo})
    const [file, args]: [string, string[]] = sudo ? ['sudo', [request.file, ...request.args]] : [request.file, request.args]
    const startedAt = new Date()
    const stdout: string[] = []
    const stderr: string[] = []

    try {
      const proc = execa(file, args, {
        reject: false,
        input: request.input ?? '',
        cwd: request.cwd,
        env: request.env,
        timeout: request.timeoutMs
      })

      const stdoutDone = (async () => {
        for await (const line of proc.iterable({from: 'stdout'})) {
          stdout.push(line)
          onLogLine?.({stream: 'stdout', line})
        }
      })()

      const stderrDone = (async () => {
        for await (const line of proc.iterable({from: 'stderr'})) {
          stderr.push(line)
          onLogLine?.({stream: 'stderr', line})
        }
      })()

      // Settle handlers go on right away so a stream error is never unhandled
      const streamsDone = Promise.allSettled([stdoutDone, stderrDone])
      const result = await proc
      await streamsDone

      if (result.timedOut) {
        throw new CommandTimeoutError(command, request.timeoutMs ?? 0)
      }

      if (result.exitCode === undefined) {
        throw new CommandLaunchError(command, {cause: result})
      }

      return {
        command,
        exitCode: result.exitCode,
        stdout: stdout.join('\n'),
        stderr: stderr.join('\n'),
        startedAt,
        finishedAt: new Date()
      }
    } catch (error) {
      if (error instanceof GroundworkError) {
        throw error
      }

      throw new CommandLaunchError(command, {cause: error})
    }
  }

  /**
   * The child opens the log file itself through a shell redirect, so its
   * output never passes through this process and keeps flowing after detach.
   */
  spawn(request: BackgroundRequest): BackgroundProcess {
    const subprocess = execa('sh', ['-c', REDIRECT_SCRIPT, 'sh', request.logFile, request.file, ...request.args], {
      reject: false,
      detached: true,
      cleanup: false,
      stdio: 'ignore',
      env: request.env
    })

    const exited = subprocess.then(result => ({exitCode: result.exitCode, signal: result.signal}))

    return new BackgroundProcess({
      pid: subprocess.pid,
      exited,
      kill(signal) {
        subprocess.kill(signal)
      },
      unref() {
        subprocess.unref()
      }
    })
  }
}
