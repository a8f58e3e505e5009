export {PipelineRunner, type PipelineRunOptions} from './pipeline-runner.js'
export {StepRunner, type StepRunOptions} from './step-runner.js'
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  StepRef,
  PipelineEvent,
  PipelineStartEvent,
  StepStartingEvent,
  StepSkippedEvent,
  StepWouldRunEvent,
  StepFinishedEvent,
  StepFailedEvent,
  PipelineFinishedEvent,
  PipelineFailedEvent
} from './reporter.js'
export type {
  ExecOptions,
  Pipeline,
  PipelineRunResult,
  ProvisioningResult,
  Step,
  StepContext,
  StepStatus
} from './step.js'
export {pollUntil, exponentialBackoff, type PollResult, type PollOptions, type DelayStrategy} from './poll.js'
export {
  loadConfig,
  parseConfig,
  CONFIG_FILE_NAME,
  type GroundworkConfig,
  type BootstrapConfig,
  type BackendSettings,
  type PackageSpec,
  type LoadConfigOptions
} from './config.js'
export {formatDuration, expandHome, firstLine} from './utils.js'
