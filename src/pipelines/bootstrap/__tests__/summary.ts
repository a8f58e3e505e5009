import {mkdir, writeFile} from 'node:fs/promises'
import {dirname} from 'node:path'
import test from 'ava'
import {parseConfig} from '../../../core/index.js'
import {renderSummary, summaryStep} from '../summary.js'
import {FakeHostExecutor, createTmpDir, runStep} from '../../../__tests__/helpers.js'

test('renderSummary: aligns values after the longest label', t => {
  t.is(renderSummary([['Timezone', 'UTC'], ['aws', 'aws-cli/2.15.0']]), [
    '========= Installed Tools Summary =========',
    'Timezone: UTC',
    'aws:      aws-cli/2.15.0',
    '==========================================='
  ].join('\n'))
})

async function bootstrapConfig() {
  const home = await createTmpDir()
  return parseConfig({
    home,
    bootstrap: {packages: [{name: 'jq', apt: ['jq'], probes: [['jq', '--version']]}]}
  }, {}).bootstrap
}

test('summary reports versions, key paths and the public IP of the run', async t => {
  const config = await bootstrapConfig()
  const executor = new FakeHostExecutor()
    .on('timedatectl show', {stdout: 'Europe/Paris'})
    .on('jq --version', {stdout: 'jq-1.6'})
    .on('aws --version', 'launch-error')

  const result = await runStep(summaryStep(config), {publicIp: '203.0.113.7'}, executor)

  t.is(result.status, 'done')
  t.is(result.report, [
    '========= Installed Tools Summary =========',
    'Timezone:  Europe/Paris',
    'jq:        jq-1.6',
    'aws:       not installed',
    `SSH key:   ${config.sshKey.path} / ${config.sshKey.path}.pub`,
    `Copy to:   ${config.sshKey.copyPath}`,
    `Public IP: 203.0.113.7 (saved to ${config.publicIp.file})`,
    '==========================================='
  ].join('\n'))
})

test('summary falls back to the saved public IP', async t => {
  const config = await bootstrapConfig()
  await mkdir(dirname(config.publicIp.file), {recursive: true})
  await writeFile(config.publicIp.file, '198.51.100.4\n')

  const result = await runStep(summaryStep(config), {}, new FakeHostExecutor())

  t.true(result.report?.includes(`Public IP: 198.51.100.4 (saved to ${config.publicIp.file})`))
})

test('summary shows the exit code of a silent failing probe', async t => {
  const config = await bootstrapConfig()
  const executor = new FakeHostExecutor().on('jq --version', {exitCode: 3})

  const result = await runStep(summaryStep(config), {}, executor)

  t.true(result.report?.split('\n').includes('jq:        exited with code 3'))
})
