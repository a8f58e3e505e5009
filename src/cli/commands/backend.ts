import process from 'node:process'
import type {Command} from 'commander'
import {loadConfig, PipelineRunner} from '../../core/index.js'
import {ExecaHostExecutor} from '../../engine/index.js'
import {createAwsStores, createBackendPipeline, createBackendRun} from '../../pipelines/backend/index.js'
import {createReporter, getGlobalOptions, settleBackendRun, type RunCommandOptions} from '../utils.js'

export function registerBackendCommand(program: Command): void {
  program
    .command('backend')
    .description('Provision the Terraform state backend and a local Vault dev server')
    .option('--dry-run', 'Check every step and show what would run without changing anything')
    .option('--verbose', 'Stream command output in real-time (interactive mode)')
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const {config: configPath, json} = getGlobalOptions(cmd)
      const {backend} = await loadConfig({path: configPath})
      const reporter = createReporter(json, options.verbose)
      const runner = new PipelineRunner(new ExecaHostExecutor(), reporter)
      const run = createBackendRun(backend)
      const pipeline = createBackendPipeline(backend, {stores: createAwsStores(backend.region)})

      const onSignal = (signal: NodeJS.Signals) => {
        void (async () => {
          await run.vault?.stop()
          process.kill(process.pid, signal)
        })()
      }

      process.once('SIGINT', onSignal)
      process.once('SIGTERM', onSignal)

      try {
        const result = await runner.run(pipeline, run, {dryRun: options.dryRun})
        process.exitCode = await settleBackendRun(result, run)
      } finally {
        process.removeListener('SIGINT', onSignal)
        process.removeListener('SIGTERM', onSignal)
      }
    })
}
