import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {
  PipelineEvent,
  PipelineFinishedEvent,
  PipelineStartEvent,
  Reporter,
  StepFailedEvent,
  StepFinishedEvent,
  StepRef
} from '../core/index.js'
import {formatDuration} from '../core/index.js'

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for running by hand on the host being provisioned.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly stepSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'PIPELINE_START': {
        this.handlePipelineStart(event)
        break
      }

      case 'STEP_STARTING': {
        const spinner = ora({text: event.step.displayName, prefixText: '  '}).start()
        this.stepSpinners.set(event.step.id, spinner)
        break
      }

      case 'STEP_SKIPPED': {
        this.persist(event.step, chalk.gray('⊙'), chalk.gray(`${event.step.displayName} (already satisfied)`))
        break
      }

      case 'STEP_WOULD_RUN': {
        this.persist(event.step, chalk.yellow('○'), chalk.yellow(`${event.step.displayName} (would run)`))
        break
      }

      case 'STEP_FINISHED': {
        this.handleStepFinished(event)
        break
      }

      case 'STEP_FAILED': {
        this.handleStepFailed(event)
        break
      }

      case 'PIPELINE_FINISHED': {
        this.handlePipelineFinished(event)
        break
      }

      case 'PIPELINE_FAILED': {
        console.log(chalk.bold.red(`\n✗ Pipeline failed at ${event.failedStep.id}\n`))
        break
      }
    }
  }

  log(_jobId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const spinner = this.stepSpinners.get(step.id)
      const prefix = chalk.gray(`  [${step.id}]`)
      if (spinner) {
        spinner.clear()
        console.log(`${prefix} ${line}`)
        spinner.render()
      } else {
        console.log(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(step.id)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(step.id, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private handlePipelineStart(event: PipelineStartEvent): void {
    const mode = event.dryRun ? chalk.yellow(' (dry run)') : ''
    console.log(chalk.bold(`\n▶ Pipeline: ${chalk.cyan(event.pipelineName)}${mode}\n`))
  }

  private persist(step: StepRef, symbol: string, text: string): void {
    const spinner = this.stepSpinners.get(step.id)
    if (spinner) {
      spinner.stopAndPersist({symbol, text})
      this.stepSpinners.delete(step.id)
    } else {
      console.log(`  ${symbol} ${text}`)
    }

    this.stderrBuffers.delete(step.id)
  }

  private handleStepFinished(event: StepFinishedEvent): void {
    this.persist(
      event.step,
      chalk.green('✓'),
      chalk.green(`${event.step.displayName} (${formatDuration(event.durationMs)})`)
    )

    if (event.report) {
      console.log()
      for (const line of event.report.split('\n')) {
        console.log(`    ${line}`)
      }

      console.log()
    }
  }

  private handlePipelineFinished(event: PipelineFinishedEvent): void {
    console.log(chalk.bold.green(`\n✓ Pipeline completed (${formatDuration(event.durationMs)})\n`))
  }

  private handleStepFailed(event: StepFailedEvent): void {
    const stderr = this.stderrBuffers.get(event.step.id) ?? []
    const exitInfo = event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`
    this.persist(event.step, chalk.red('✗'), chalk.red(`${event.step.displayName}${exitInfo}`))
    console.log(chalk.red(`  ${event.message}`))

    if (stderr.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }
  }
}
