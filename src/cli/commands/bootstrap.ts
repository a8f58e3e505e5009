import process from 'node:process'
import type {Command} from 'commander'
import {loadConfig, PipelineRunner} from '../../core/index.js'
import {ExecaHostExecutor} from '../../engine/index.js'
import {createBootstrapPipeline, createBootstrapRun} from '../../pipelines/bootstrap/index.js'
import {createReporter, exitCodeFor, getGlobalOptions, type RunCommandOptions} from '../utils.js'

export function registerBootstrapCommand(program: Command): void {
  program
    .command('bootstrap')
    .description('Prepare this host: packages, timezone, AWS CLI, SSH key, public IP')
    .option('--dry-run', 'Check every step and show what would run without changing anything')
    .option('--verbose', 'Stream command output in real-time (interactive mode)')
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const {config: configPath, json} = getGlobalOptions(cmd)
      const config = await loadConfig({path: configPath})
      const reporter = createReporter(json, options.verbose)
      const runner = new PipelineRunner(new ExecaHostExecutor(), reporter)

      const result = await runner.run(createBootstrapPipeline(config.bootstrap), createBootstrapRun(), {dryRun: options.dryRun})
      process.exitCode = exitCodeFor(result)
    })
}
