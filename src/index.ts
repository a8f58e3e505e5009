/**
 * Programmatic entry point.
 *
 * Pipelines are plain data built by factories and run by a PipelineRunner
 * against a HostExecutor. For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {ConsoleReporter, ExecaHostExecutor, PipelineRunner, createBootstrapPipeline, createBootstrapRun, loadConfig} from 'groundwork'
 *
 * const config = await loadConfig()
 * const runner = new PipelineRunner(new ExecaHostExecutor(), new ConsoleReporter())
 * const result = await runner.run(createBootstrapPipeline(config.bootstrap), createBootstrapRun(), {dryRun: true})
 * console.log(result.results.map(r => `${r.stepId}: ${r.status}`))
 * ```
 */

// Host command execution
export {
  HostExecutor,
  ExecaHostExecutor,
  BackgroundProcess,
  formatCommand,
  type ProcessControl,
  type StopSignal,
  type CommandRequest,
  type CommandResult,
  type BackgroundRequest,
  type ProcessExit,
  type LogLine,
  type OnLogLine
} from './engine/index.js'

// Step model, runners, reporting and configuration
export {
  PipelineRunner,
  StepRunner,
  ConsoleReporter,
  pollUntil,
  exponentialBackoff,
  loadConfig,
  parseConfig,
  CONFIG_FILE_NAME,
  formatDuration,
  type Reporter,
  type PipelineEvent,
  type StepRef,
  type Step,
  type StepContext,
  type ExecOptions,
  type Pipeline,
  type PipelineRunResult,
  type ProvisioningResult,
  type StepStatus,
  type PollResult,
  type GroundworkConfig,
  type BootstrapConfig,
  type BackendSettings,
  type PackageSpec
} from './core/index.js'

// Pipelines
export {
  createBootstrapPipeline,
  createBootstrapRun,
  fetchPublicIp,
  renderSummary,
  type BootstrapRun,
  type PublicIpResolver
} from './pipelines/bootstrap/index.js'
export {
  createBackendPipeline,
  createBackendRun,
  createBackendConfig,
  renderBackendConfig,
  renderBackendReport,
  createAwsStores,
  VaultDevServer,
  checkVaultHealth,
  stopVaultFromPidFile,
  type BackendRun,
  type BackendConfig,
  type BackendStores,
  type StateBucketStore,
  type LockTableStore,
  type HealthCheck
} from './pipelines/backend/index.js'

// Errors
export * from './errors.js'
