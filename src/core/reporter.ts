import pino, {type Logger} from 'pino'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: string;
  displayName: string;
}

/**
 * Discriminated union of pipeline execution events.
 *
 * Lifecycle:
 * 1. PIPELINE_START - Pipeline execution begins
 * 2. For each step, in order:
 *    a. STEP_STARTING - Step begins (precondition is about to be checked)
 *    b. STEP_FINISHED - Action and postcondition succeeded
 *       OR STEP_SKIPPED - Precondition already held, action not run
 *       OR STEP_WOULD_RUN - Precondition does not hold (dry-run mode)
 *       OR STEP_FAILED - Precondition, action or postcondition failed
 * 3. PIPELINE_FINISHED - Every step is done or skipped
 *    OR PIPELINE_FAILED - Stopped at the first failed step
 */
export type PipelineStartEvent = {
  event: 'PIPELINE_START';
  jobId: string;
  pipelineName: string;
  steps: StepRef[];
  dryRun: boolean;
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  jobId: string;
  step: StepRef;
}

export type StepSkippedEvent = {
  event: 'STEP_SKIPPED';
  jobId: string;
  step: StepRef;
  reason: 'satisfied';
}

export type StepWouldRunEvent = {
  event: 'STEP_WOULD_RUN';
  jobId: string;
  step: StepRef;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  jobId: string;
  step: StepRef;
  durationMs: number;
  /** Text the step produced for display (summary, rendered config) */
  report?: string;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  jobId: string;
  step: StepRef;
  message: string;
  code?: string;
  exitCode?: number;
}

export type PipelineFinishedEvent = {
  event: 'PIPELINE_FINISHED';
  jobId: string;
  pipelineName: string;
  durationMs: number;
}

export type PipelineFailedEvent = {
  event: 'PIPELINE_FAILED';
  jobId: string;
  pipelineName: string;
  failedStep: StepRef;
}

export type PipelineEvent =
  | PipelineStartEvent
  | StepStartingEvent
  | StepSkippedEvent
  | StepWouldRunEvent
  | StepFinishedEvent
  | StepFailedEvent
  | PipelineFinishedEvent
  | PipelineFailedEvent

/**
 * Interface for reporting pipeline execution events.
 */
export type Reporter = {
  /** Reports pipeline and step state transitions */
  emit(event: PipelineEvent): void;
  /** Reports command output and step messages */
  log(jobId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly logger: Logger = pino({level: 'info'})) {}

  emit(event: PipelineEvent): void {
    if (event.event === 'STEP_FAILED' || event.event === 'PIPELINE_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }

  log(jobId: string, step: StepRef, stream: 'stdout' | 'stderr', line: string): void {
    this.logger.info({jobId, stepId: step.id, stream, line})
  }
}
