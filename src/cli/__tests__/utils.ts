import test from 'ava'
import type {PipelineRunResult} from '../../core/index.js'
import {BackgroundProcess} from '../../engine/index.js'
import {VaultDevServer} from '../../pipelines/backend/index.js'
import {backendSettings, fixedRun} from '../../pipelines/backend/__tests__/helpers.js'
import {FakeProcessControl} from '../../__tests__/helpers.js'
import {exitCodeFor, settleBackendRun} from '../utils.js'

const succeeded: PipelineRunResult = {jobId: 'test-job', status: 'success', results: []}

const failed: PipelineRunResult = {
  jobId: 'test-job',
  status: 'failed',
  results: [],
  failedStep: {stepId: 'lock-table-active', stepName: 'Wait for lock table', status: 'failed', output: [], durationMs: 0}
}

async function runWithServer() {
  const settings = await backendSettings()
  const control = new FakeProcessControl()
  const run = fixedRun(settings)
  run.vault = new VaultDevServer(new BackgroundProcess(control), settings.vault, async () => true)
  return {run, control}
}

test('exitCodeFor: 0 on success, 1 on failure', t => {
  t.is(exitCodeFor(succeeded), 0)
  t.is(exitCodeFor(failed), 1)
})

test('settleBackendRun: a successful run leaves the dev server running', async t => {
  const {run, control} = await runWithServer()

  t.is(await settleBackendRun(succeeded, run), 0)
  t.is(control.unrefCalls, 1)
  t.deepEqual(control.signals, [])
})

test('settleBackendRun: a failed run stops the dev server', async t => {
  const {run, control} = await runWithServer()

  t.is(await settleBackendRun(failed, run), 1)
  t.deepEqual(control.signals, ['SIGTERM'])
  t.is(control.unrefCalls, 0)
})

test('settleBackendRun: a run without dev server only yields the exit code', async t => {
  const settings = await backendSettings()

  t.is(await settleBackendRun(failed, fixedRun(settings)), 1)
})
