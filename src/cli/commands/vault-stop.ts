import type {Command} from 'commander'
import chalk from 'chalk'
import {loadConfig} from '../../core/index.js'
import {stopVaultFromPidFile} from '../../pipelines/backend/index.js'
import {getGlobalOptions} from '../utils.js'

export function registerVaultStopCommand(program: Command): void {
  program
    .command('vault-stop')
    .description('Stop the Vault dev server started by `backend`')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {config: configPath, json} = getGlobalOptions(cmd)
      const {backend} = await loadConfig({path: configPath})
      const outcome = await stopVaultFromPidFile(backend.vault.pidFile)

      if (json) {
        console.log(JSON.stringify({pidFile: backend.vault.pidFile, outcome}))
        return
      }

      console.log(outcome === 'stopped'
        ? chalk.green('Vault dev server stopped.')
        : chalk.gray('No Vault dev server running.'))
    })
}
