import type {Command} from 'commander'
import {ConsoleReporter, type PipelineRunResult, type Reporter} from '../core/index.js'
import type {BackendRun} from '../pipelines/backend/index.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  config?: string;
  json?: boolean;
}

export type RunCommandOptions = {
  dryRun?: boolean;
  verbose?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export function createReporter(json: boolean | undefined, verbose: boolean | undefined): Reporter {
  return json ? new ConsoleReporter() : new InteractiveReporter({verbose})
}

export function exitCodeFor(result: PipelineRunResult): number {
  return result.status === 'success' ? 0 : 1
}

/**
 * Ends the backend command: a dev server started by a successful run is
 * detached and keeps serving until `vault-stop`, one started by a failed run
 * is stopped. Resolves to the process exit code.
 */
export async function settleBackendRun(result: PipelineRunResult, run: BackendRun): Promise<number> {
  if (result.status === 'success') {
    run.vault?.detach()
  } else {
    await run.vault?.stop()
  }

  return exitCodeFor(result)
}
