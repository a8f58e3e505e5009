import {dirname} from 'node:path'
import {chmod, copyFile, mkdir} from 'node:fs/promises'
import type {BootstrapConfig, Step} from '../../core/index.js'
import {fileExists} from '../host.js'
import type {BootstrapRun} from './types.js'

type SshKeySettings = BootstrapConfig['sshKey']

/**
 * Generates the RSA keypair unless the private key already exists, so reruns
 * never rotate the key.
 */
export function sshKeyStep(settings: SshKeySettings): Step<BootstrapRun> {
  return {
    id: 'ssh-key',
    name: 'Generate SSH key',
    async precondition() {
      return fileExists(settings.path)
    },
    async action(ctx) {
      await mkdir(dirname(settings.path), {recursive: true, mode: 0o700})
      await ctx.exec('ssh-keygen', [
        '-t', 'rsa',
        '-b', String(settings.bits),
        '-f', settings.path,
        '-N', '',
        '-C', settings.comment
      ])
      ctx.log(`SSH key generated at ${settings.path}`)
    },
    async postcondition() {
      return await fileExists(settings.path) && await fileExists(`${settings.path}.pub`)
    }
  }
}

/** Copies the private key into the projects directory, overwriting any previous copy. */
export function sshKeyCopyStep(settings: SshKeySettings): Step<BootstrapRun> {
  return {
    id: 'ssh-key-copy',
    name: 'Copy SSH key to projects directory',
    async action(ctx) {
      await mkdir(dirname(settings.copyPath), {recursive: true})
      await copyFile(settings.path, settings.copyPath)
      await chmod(settings.copyPath, 0o600)
      ctx.log(`SSH key copied to ${settings.copyPath}`)
    }
  }
}
