import type {HostExecutor} from '../engine/index.js'
import {CommandFailedError, GroundworkError, PostconditionError} from '../errors.js'
import type {Reporter, StepFailedEvent, StepRef} from './reporter.js'
import type {ExecOptions, ProvisioningResult, Step, StepContext} from './step.js'

export type StepRunOptions<C> = {
  jobId: string;
  run: C;
  dryRun?: boolean;
}

/**
 * Executes a single step: precondition, action, postcondition.
 *
 * Errors never escape: whatever a step throws is reported as STEP_FAILED and
 * returned on the result, so the caller decides whether to go on.
 */
export class StepRunner {
  constructor(
    private readonly executor: HostExecutor,
    private readonly reporter: Reporter
  ) {}

  async run<C>(step: Step<C>, options: StepRunOptions<C>): Promise<ProvisioningResult> {
    const {jobId, dryRun} = options
    const stepRef: StepRef = {id: step.id, displayName: step.name}
    const output: string[] = []
    const ctx = this.createContext(stepRef, options, output)
    const startedAt = Date.now()
    const base = {stepId: step.id, stepName: step.name, output}

    this.reporter.emit({event: 'STEP_STARTING', jobId, step: stepRef})

    try {
      if (step.precondition && await step.precondition(ctx)) {
        this.reporter.emit({event: 'STEP_SKIPPED', jobId, step: stepRef, reason: 'satisfied'})
        return {...base, status: 'skipped', durationMs: Date.now() - startedAt}
      }

      if (dryRun) {
        this.reporter.emit({event: 'STEP_WOULD_RUN', jobId, step: stepRef})
        return {...base, status: 'would-run', durationMs: Date.now() - startedAt}
      }

      const returned = await step.action(ctx)
      const report = typeof returned === 'string' ? returned : undefined

      if (step.postcondition && !await step.postcondition(ctx)) {
        throw new PostconditionError(step.id)
      }

      const durationMs = Date.now() - startedAt
      this.reporter.emit({event: 'STEP_FINISHED', jobId, step: stepRef, durationMs, report})
      return {...base, status: 'done', report, durationMs}
    } catch (error) {
      this.reporter.emit(failedEvent(jobId, stepRef, error))
      return {...base, status: 'failed', durationMs: Date.now() - startedAt, error}
    }
  }

  private createContext<C>(stepRef: StepRef, options: StepRunOptions<C>, output: string[]): StepContext<C> {
    const {jobId, run} = options
    const record = (stream: 'stdout' | 'stderr', line: string) => {
      output.push(line)
      this.reporter.log(jobId, stepRef, stream, line)
    }

    return {
      run,
      step: stepRef,
      exec: async (file: string, args: string[], execOptions: ExecOptions = {}) => {
        const {allowFailure, quiet, ...request} = execOptions
        const result = await this.executor.run(
          {...request, file, args},
          quiet ? undefined : ({stream, line}) => {
            record(stream, line)
          }
        )

        if (result.exitCode !== 0 && !allowFailure) {
          throw new CommandFailedError(result.command, result.exitCode)
        }

        return result
      },
      spawn: request => this.executor.spawn(request),
      log(line: string) {
        record('stdout', line)
      },
      warn(line: string) {
        record('stderr', line)
      }
    }
  }
}

function failedEvent(jobId: string, step: StepRef, error: unknown): StepFailedEvent {
  const event: StepFailedEvent = {
    event: 'STEP_FAILED',
    jobId,
    step,
    message: error instanceof Error ? error.message : String(error)
  }

  if (error instanceof GroundworkError) {
    event.code = error.code
  }

  if (error instanceof CommandFailedError) {
    event.exitCode = error.exitCode
  }

  return event
}
