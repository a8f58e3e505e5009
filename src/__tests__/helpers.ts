import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {PipelineEvent, Reporter, StepRef} from '../core/index.js'
import {StepRunner, type ProvisioningResult, type Step} from '../core/index.js'
import {
  BackgroundProcess,
  HostExecutor,
  formatCommand,
  type BackgroundRequest,
  type CommandRequest,
  type CommandResult,
  type OnLogLine,
  type ProcessControl,
  type ProcessExit,
  type StopSignal
} from '../engine/index.js'
import {CommandLaunchError} from '../errors.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'groundwork-test-'))
}

/**
 * Silent reporter — all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */},
  log() {/* noop */}
}

export type RecordedLog = {
  stepId: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

/**
 * Returns a reporter that records events and log lines for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PipelineEvent[]; logs: RecordedLog[]} {
  const events: PipelineEvent[] = []
  const logs: RecordedLog[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    },
    log(_jobId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string) {
      logs.push({stepId: step.id, stream, line})
    }
  }

  return {reporter, events, logs}
}

/** Scripted answer of the fake executor; 'launch-error' means the executable does not exist. */
export type FakeResponse = {exitCode?: number; stdout?: string; stderr?: string} | 'launch-error'

/** Command prefix such as `dpkg -s`, or a predicate on the request. */
export type FakeMatcher = string | ((request: CommandRequest) => boolean)

/**
 * In-process stand-in for the host: answers commands from scripted responses
 * and records every request. Unscripted commands succeed with no output.
 *
 * String matchers are compared with the display form of the command without
 * sudo (e.g. `dpkg -s curl`), by whole-word prefix; the most recently added
 * match wins.
 */
export class FakeHostExecutor extends HostExecutor {
  readonly commands: CommandRequest[] = []
  readonly spawned: BackgroundRequest[] = []
  readonly processes: FakeProcessControl[] = []
  private readonly responses: Array<{matcher: FakeMatcher; response: FakeResponse | ((request: CommandRequest) => FakeResponse)}> = []

  /** @param createProcess - Builds the control of each spawned process */
  constructor(private readonly createProcess: (request: BackgroundRequest) => FakeProcessControl = () => new FakeProcessControl()) {
    super()
  }

  on(matcher: FakeMatcher, response: FakeResponse | ((request: CommandRequest) => FakeResponse)): this {
    this.responses.push({matcher, response})
    return this
  }

  /** Display forms of the recorded commands, with sudo when requested. */
  get commandLines(): string[] {
    return this.commands.map(request => formatCommand(request))
  }

  async run(request: CommandRequest, onLogLine?: OnLogLine): Promise<CommandResult> {
    this.commands.push(request)
    const command = formatCommand(request)
    const key = formatCommand({file: request.file, args: request.args})
    const response = this.respond(key, request)

    if (response === 'launch-error') {
      throw new CommandLaunchError(command)
    }

    const stdout = response.stdout ?? ''
    const stderr = response.stderr ?? ''
    for (const line of splitLines(stdout)) {
      onLogLine?.({stream: 'stdout', line})
    }

    for (const line of splitLines(stderr)) {
      onLogLine?.({stream: 'stderr', line})
    }

    const now = new Date()
    return {command, exitCode: response.exitCode ?? 0, stdout, stderr, startedAt: now, finishedAt: now}
  }

  private respond(key: string, request: CommandRequest): FakeResponse {
    for (let i = this.responses.length - 1; i >= 0; i--) {
      const {matcher, response} = this.responses[i]
      const matches = typeof matcher === 'string'
        ? key === matcher || key.startsWith(`${matcher} `)
        : matcher(request)
      if (matches) {
        return typeof response === 'function' ? response(request) : response
      }
    }

    return {}
  }

  spawn(request: BackgroundRequest): BackgroundProcess {
    this.spawned.push(request)
    const control = this.createProcess(request)
    this.processes.push(control)
    return new BackgroundProcess(control)
  }
}

function splitLines(text: string): string[] {
  return text === '' ? [] : text.split('\n')
}

/**
 * Fake process control. By default the process exits as soon as it is
 * signalled; `ignoreSignals` lists signals it survives.
 */
export class FakeProcessControl implements ProcessControl {
  readonly exited: Promise<ProcessExit>
  readonly signals: StopSignal[] = []
  unrefCalls = 0
  private readonly resolveExit: (exit: ProcessExit) => void

  constructor(readonly pid: number | undefined = 4242, private readonly ignoreSignals: StopSignal[] = []) {
    let resolveExit: (exit: ProcessExit) => void = () => {/* replaced below */}
    this.exited = new Promise(resolve => {
      resolveExit = resolve
    })
    this.resolveExit = resolveExit
  }

  kill(signal: StopSignal): void {
    this.signals.push(signal)
    if (!this.ignoreSignals.includes(signal)) {
      this.exit({signal})
    }
  }

  unref(): void {
    this.unrefCalls++
  }

  exit(exit: ProcessExit): void {
    this.resolveExit(exit)
  }
}

/** Runs a single step through the real StepRunner. */
export async function runStep<C>(
  step: Step<C>,
  run: C,
  executor: HostExecutor = new FakeHostExecutor(),
  options?: {dryRun?: boolean; reporter?: Reporter}
): Promise<ProvisioningResult> {
  const runner = new StepRunner(executor, options?.reporter ?? noopReporter)
  return runner.run(step, {jobId: 'test-job', run, dryRun: options?.dryRun})
}
