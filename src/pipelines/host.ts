import {access} from 'node:fs/promises'
import type {PackageSpec, StepContext} from '../core/index.js'
import {CommandLaunchError} from '../errors.js'

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/** True when the command can be started and exits 0. */
export async function commandSucceeds<C>(ctx: StepContext<C>, file: string, args: string[], options?: {quiet?: boolean}): Promise<boolean> {
  try {
    const result = await ctx.exec(file, args, {allowFailure: true, quiet: options?.quiet ?? true})
    return result.exitCode === 0
  } catch (error) {
    if (error instanceof CommandLaunchError) {
      return false
    }

    throw error
  }
}

export async function isPackageInstalled<C>(ctx: StepContext<C>, name: string): Promise<boolean> {
  return commandSucceeds(ctx, 'dpkg', ['-s', name])
}

/** Returns the subset of `names` that dpkg does not report as installed, in input order. */
export async function missingPackages<C>(ctx: StepContext<C>, names: string[]): Promise<string[]> {
  const missing: string[] = []
  for (const name of names) {
    if (!await isPackageInstalled(ctx, name)) {
      missing.push(name)
    }
  }

  return missing
}

export async function aptUpdate<C>(ctx: StepContext<C>): Promise<void> {
  await ctx.exec('apt-get', ['update', '-y'], {sudo: true})
}

export async function aptInstall<C>(ctx: StepContext<C>, names: string[]): Promise<void> {
  await ctx.exec('apt-get', ['install', '-y', ...names], {sudo: true})
}

/**
 * Runs a package's version probes with their output captured.
 * Resolves to false when a required probe fails; optional probes only warn.
 */
export async function probeVersions<C>(ctx: StepContext<C>, spec: PackageSpec): Promise<boolean> {
  for (const [file, ...args] of spec.probes) {
    if (await commandSucceeds(ctx, file, args, {quiet: false})) {
      continue
    }

    if (!spec.optionalProbe) {
      return false
    }

    ctx.warn(`Version probe "${[file, ...args].join(' ')}" failed for ${spec.name}, continuing`)
  }

  return true
}
