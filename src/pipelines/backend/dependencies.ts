import type {BackendSettings, PackageSpec, Step} from '../../core/index.js'
import {aptInstall, aptUpdate, fileExists, missingPackages, probeVersions} from '../host.js'
import type {BackendRun} from './types.js'

export function aptUpdateStep(): Step<BackendRun> {
  return {
    id: 'apt-update',
    name: 'Refresh package index',
    async action(ctx) {
      await aptUpdate(ctx)
    }
  }
}

/** Installs only the packages dpkg does not already know about. */
export function essentialPackagesStep(packages: string[]): Step<BackendRun> {
  return {
    id: 'essential-packages',
    name: 'Install missing essential packages',
    async precondition(ctx) {
      return (await missingPackages(ctx, packages)).length === 0
    },
    async action(ctx) {
      const missing = await missingPackages(ctx, packages)
      ctx.log(`Installing: ${missing.join(' ')}`)
      await aptInstall(ctx, missing)
    }
  }
}

/**
 * Registers the HashiCorp apt repository: dearmored signing key in the
 * keyring, one `deb` line for the host's release codename.
 */
export function hashicorpRepositoryStep(settings: BackendSettings['hashicorp']): Step<BackendRun> {
  return {
    id: 'hashicorp-repository',
    name: 'Add HashiCorp apt repository',
    async precondition() {
      return await fileExists(settings.keyring) && await fileExists(settings.sourcesList)
    },
    async action(ctx) {
      const key = await ctx.exec('curl', ['-fsSL', settings.keyUrl], {quiet: true})
      await ctx.exec('gpg', ['--batch', '--yes', '--dearmor', '-o', settings.keyring], {sudo: true, input: `${key.stdout}\n`})

      const release = await ctx.exec('lsb_release', ['-cs'], {quiet: true})
      const line = `deb [signed-by=${settings.keyring}] ${settings.repoUrl} ${release.stdout.trim()} main`
      await ctx.exec('tee', [settings.sourcesList], {sudo: true, input: `${line}\n`, quiet: true})
      ctx.log(`Added ${line}`)
    }
  }
}

export function hashicorpToolsStep(specs: PackageSpec[]): Step<BackendRun> {
  const packages = specs.flatMap(spec => spec.apt)
  return {
    id: 'hashicorp-tools',
    name: `Install ${specs.map(spec => spec.name).join(' and ')}`,
    async precondition(ctx) {
      return (await missingPackages(ctx, packages)).length === 0
    },
    async action(ctx) {
      await aptUpdate(ctx)
      await aptInstall(ctx, packages)
    },
    async postcondition(ctx) {
      for (const spec of specs) {
        if (!await probeVersions(ctx, spec)) {
          return false
        }
      }

      return true
    }
  }
}
