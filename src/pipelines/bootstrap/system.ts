import type {Step, StepContext} from '../../core/index.js'
import {CommandLaunchError} from '../../errors.js'
import {aptUpdate} from '../host.js'
import type {BootstrapRun} from './types.js'

export function systemUpdateStep(): Step<BootstrapRun> {
  return {
    id: 'system-update',
    name: 'Update and upgrade system packages',
    async action(ctx) {
      await aptUpdate(ctx)
      await ctx.exec('apt-get', ['upgrade', '-y'], {sudo: true})
    }
  }
}

export function timezoneStep(timezone: string): Step<BootstrapRun> {
  return {
    id: 'timezone',
    name: `Set timezone to ${timezone}`,
    async precondition(ctx) {
      return await currentTimezone(ctx) === timezone
    },
    async action(ctx) {
      await ctx.exec('timedatectl', ['set-timezone', timezone], {sudo: true})
    },
    async postcondition(ctx) {
      return await currentTimezone(ctx) === timezone
    }
  }
}

/** The system timezone as timedatectl reports it, undefined when it cannot be read. */
export async function currentTimezone<C>(ctx: StepContext<C>): Promise<string | undefined> {
  try {
    const result = await ctx.exec('timedatectl', ['show', '-p', 'Timezone', '--value'], {allowFailure: true, quiet: true})
    return result.exitCode === 0 ? result.stdout.trim() : undefined
  } catch (error) {
    if (error instanceof CommandLaunchError) {
      return undefined
    }

    throw error
  }
}
