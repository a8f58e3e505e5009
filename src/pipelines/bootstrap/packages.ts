import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {mkdtemp, rm} from 'node:fs/promises'
import type {PackageSpec, Step} from '../../core/index.js'
import {aptInstall, commandSucceeds, missingPackages, probeVersions} from '../host.js'
import type {BootstrapRun} from './types.js'

export function essentialUtilitiesStep(packages: string[]): Step<BootstrapRun> {
  return {
    id: 'essential-utilities',
    name: `Install required utilities (${packages.join(' ')})`,
    async precondition(ctx) {
      return (await missingPackages(ctx, packages)).length === 0
    },
    async action(ctx) {
      await aptInstall(ctx, packages)
    }
  }
}

/**
 * Installs one package entry. Already-installed entries are skipped; the
 * entry's version probes double as the postcondition.
 */
export function packageStep(spec: PackageSpec): Step<BootstrapRun> {
  return {
    id: `install-${spec.name}`,
    name: `Install ${spec.name}`,
    async precondition(ctx) {
      return (await missingPackages(ctx, spec.apt)).length === 0
    },
    async action(ctx) {
      await aptInstall(ctx, spec.apt)
    },
    async postcondition(ctx) {
      return probeVersions(ctx, spec)
    }
  }
}

/**
 * Installs AWS CLI v2 from the official bundle: download, unzip, run the
 * bundled installer. The download directory is removed afterwards.
 */
export function awsCliStep(url: string): Step<BootstrapRun> {
  return {
    id: 'aws-cli',
    name: 'Install AWS CLI',
    async precondition(ctx) {
      return commandSucceeds(ctx, 'aws', ['--version'])
    },
    async action(ctx) {
      const dir = await mkdtemp(join(tmpdir(), 'groundwork-awscli-'))
      try {
        const archive = join(dir, 'awscliv2.zip')
        await ctx.exec('curl', ['-fsSL', url, '-o', archive])
        await ctx.exec('unzip', ['-q', '-o', archive, '-d', dir])
        await ctx.exec(join(dir, 'aws', 'install'), [], {sudo: true})
      } finally {
        await rm(dir, {recursive: true, force: true})
      }
    },
    async postcondition(ctx) {
      return commandSucceeds(ctx, 'aws', ['--version'], {quiet: false})
    }
  }
}
