#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {registerBackendCommand} from './commands/backend.js'
import {registerBootstrapCommand} from './commands/bootstrap.js'
import {registerVaultStopCommand} from './commands/vault-stop.js'

async function main() {
  const program = new Command()

  program
    .name('groundwork')
    .description('Provision a Linux host and a Terraform state backend')
    .version('0.1.0')
    .option('-c, --config <path>', 'Configuration file (default: .groundwork.yml)', process.env.GROUNDWORK_CONFIG)
    .option('--json', 'Output structured JSON logs')

  registerBootstrapCommand(program)
  registerBackendCommand(program)
  registerVaultStopCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error instanceof Error ? error.message : error)
  process.exitCode = 1
}
