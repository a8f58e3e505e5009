import {Writable} from 'node:stream'
import test from 'ava'
import pino from 'pino'
import {ConsoleReporter} from '../reporter.js'

function capture(): {reporter: ConsoleReporter; records: () => Array<Record<string, unknown>>} {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString())
      callback()
    }
  })
  const reporter = new ConsoleReporter(pino({level: 'info'}, stream))
  const records = () => chunks.join('').split('\n').filter(Boolean).map(line => JSON.parse(line) as Record<string, unknown>)
  return {reporter, records}
}

const step = {id: 'timezone', displayName: 'Set timezone to UTC'}

test('events are logged at info level', t => {
  const {reporter, records} = capture()
  reporter.emit({event: 'STEP_SKIPPED', jobId: 'job-1', step, reason: 'satisfied'})

  const [record] = records()
  t.is(record.level, 30)
  t.is(record.event, 'STEP_SKIPPED')
  t.is(record.jobId, 'job-1')
})

test('failures are logged at error level', t => {
  const {reporter, records} = capture()
  reporter.emit({event: 'STEP_FAILED', jobId: 'job-1', step, message: 'boom', code: 'COMMAND_FAILED', exitCode: 1})
  reporter.emit({event: 'PIPELINE_FAILED', jobId: 'job-1', pipelineName: 'bootstrap', failedStep: step})

  t.deepEqual(records().map(record => record.level), [50, 50])
})

test('log lines carry the step id and stream', t => {
  const {reporter, records} = capture()
  reporter.log('job-1', step, 'stderr', 'warning: clock skew')

  const [record] = records()
  t.is(record.stepId, 'timezone')
  t.is(record.stream, 'stderr')
  t.is(record.line, 'warning: clock skew')
})
