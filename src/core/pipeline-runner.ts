import {randomUUID} from 'node:crypto'
import type {HostExecutor} from '../engine/index.js'
import type {Reporter, StepRef} from './reporter.js'
import type {Pipeline, PipelineRunResult, ProvisioningResult} from './step.js'
import {StepRunner} from './step-runner.js'

export type PipelineRunOptions = {
  /** Check preconditions only, report which steps would run. */
  dryRun?: boolean;
  /** Correlation id for events (default: random UUID). */
  jobId?: string;
}

/**
 * Runs a pipeline's steps strictly in order and stops at the first failure.
 *
 * ## Workflow
 *
 * 1. Emits PIPELINE_START with the full step list
 * 2. For each step, delegates to StepRunner:
 *    a. satisfied precondition: step is skipped, pipeline goes on
 *    b. action and postcondition succeed: step is done, pipeline goes on
 *    c. anything fails: PIPELINE_FAILED, no later step runs
 * 3. Emits PIPELINE_FINISHED once every step is done or skipped
 *
 * There are no retries and no parallelism. Steps needing bounded waits do
 * their own polling.
 */
export class PipelineRunner {
  private readonly stepRunner: StepRunner

  constructor(
    executor: HostExecutor,
    private readonly reporter: Reporter
  ) {
    this.stepRunner = new StepRunner(executor, reporter)
  }

  async run<C>(pipeline: Pipeline<C>, run: C, options?: PipelineRunOptions): Promise<PipelineRunResult> {
    const jobId = options?.jobId ?? randomUUID()
    const dryRun = options?.dryRun ?? false
    const startedAt = Date.now()
    const steps: StepRef[] = pipeline.steps.map(step => ({id: step.id, displayName: step.name}))

    this.reporter.emit({event: 'PIPELINE_START', jobId, pipelineName: pipeline.name, steps, dryRun})

    const results: ProvisioningResult[] = []
    for (const step of pipeline.steps) {
      const result = await this.stepRunner.run(step, {jobId, run, dryRun})
      results.push(result)

      if (result.status === 'failed') {
        this.reporter.emit({
          event: 'PIPELINE_FAILED',
          jobId,
          pipelineName: pipeline.name,
          failedStep: {id: step.id, displayName: step.name}
        })
        return {jobId, status: 'failed', results, failedStep: result}
      }
    }

    this.reporter.emit({event: 'PIPELINE_FINISHED', jobId, pipelineName: pipeline.name, durationMs: Date.now() - startedAt})
    return {jobId, status: 'success', results}
  }
}
