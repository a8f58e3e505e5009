import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {
  aptUpdateStep,
  essentialPackagesStep,
  hashicorpRepositoryStep,
  hashicorpToolsStep
} from '../dependencies.js'
import {backendSettings, fixedRun} from './helpers.js'
import {FakeHostExecutor, createTmpDir, runStep} from '../../../__tests__/helpers.js'

async function hashicorpSettings() {
  const dir = await createTmpDir()
  const settings = await backendSettings({
    hashicorp: {
      keyring: join(dir, 'hashicorp-archive-keyring.gpg'),
      sourcesList: join(dir, 'hashicorp.list')
    }
  })
  return {settings, run: fixedRun(settings)}
}

test('apt update always runs', async t => {
  const {run} = await hashicorpSettings()
  const executor = new FakeHostExecutor()
  const result = await runStep(aptUpdateStep(), run, executor)

  t.is(result.status, 'done')
  t.deepEqual(executor.commandLines, ['sudo apt-get update -y'])
})

test('installs only the missing essential packages', async t => {
  const {run} = await hashicorpSettings()
  const executor = new FakeHostExecutor()
    .on('dpkg -s curl', {exitCode: 1})
    .on('dpkg -s gnupg', {exitCode: 1})
  const result = await runStep(essentialPackagesStep(['unzip', 'curl', 'gnupg']), run, executor)

  t.is(result.status, 'done')
  t.is(executor.commandLines.at(-1), 'sudo apt-get install -y curl gnupg')
  t.deepEqual(result.output, ['Installing: curl gnupg'])
})

test('essential packages all present is skipped', async t => {
  const {run} = await hashicorpSettings()
  const executor = new FakeHostExecutor()
  const result = await runStep(essentialPackagesStep(['unzip', 'curl']), run, executor)

  t.is(result.status, 'skipped')
  t.false(executor.commandLines.some(line => line.includes('apt-get')))
})

test('registers the HashiCorp repository for the host release', async t => {
  const {settings, run} = await hashicorpSettings()
  const {keyring, sourcesList} = settings.hashicorp
  const executor = new FakeHostExecutor()
    .on('curl -fsSL https://apt.releases.hashicorp.com/gpg', {stdout: 'ARMORED KEY'})
    .on('lsb_release -cs', {stdout: 'jammy\n'})

  const result = await runStep(hashicorpRepositoryStep(settings.hashicorp), run, executor)

  t.is(result.status, 'done')
  const [, gpg, , tee] = executor.commands
  t.deepEqual(gpg, {file: 'gpg', args: ['--batch', '--yes', '--dearmor', '-o', keyring], sudo: true, input: 'ARMORED KEY\n'})
  t.deepEqual(tee, {
    file: 'tee',
    args: [sourcesList],
    sudo: true,
    input: `deb [signed-by=${keyring}] https://apt.releases.hashicorp.com jammy main\n`
  })
  t.deepEqual(result.output, [`Added deb [signed-by=${keyring}] https://apt.releases.hashicorp.com jammy main`])
})

test('an existing repository is skipped', async t => {
  const {settings, run} = await hashicorpSettings()
  await writeFile(settings.hashicorp.keyring, 'key')
  await writeFile(settings.hashicorp.sourcesList, 'deb ...\n')
  const executor = new FakeHostExecutor()

  const result = await runStep(hashicorpRepositoryStep(settings.hashicorp), run, executor)

  t.is(result.status, 'skipped')
  t.deepEqual(executor.commands, [])
})

test('installs terraform and vault then checks their versions', async t => {
  const {settings, run} = await hashicorpSettings()
  const executor = new FakeHostExecutor()
    .on('dpkg -s vault', {exitCode: 1})
    .on('terraform -version', {stdout: 'Terraform v1.8.2'})
    .on('vault -version', {stdout: 'Vault v1.16.2'})

  const step = hashicorpToolsStep(settings.hashicorp.packages)
  const result = await runStep(step, run, executor)

  t.is(step.name, 'Install terraform and vault')
  t.is(result.status, 'done')
  t.deepEqual(executor.commandLines.slice(2), [
    'sudo apt-get update -y',
    'sudo apt-get install -y terraform vault',
    'terraform -version',
    'vault -version'
  ])
  t.deepEqual(result.output, ['Terraform v1.8.2', 'Vault v1.16.2'])
})

test('a tool that does not answer its version probe fails the step', async t => {
  const {settings, run} = await hashicorpSettings()
  const executor = new FakeHostExecutor()
    .on('dpkg -s', {exitCode: 1})
    .on('vault', 'launch-error')

  const result = await runStep(hashicorpToolsStep(settings.hashicorp.packages), run, executor)

  t.is(result.status, 'failed')
})
