import {readFile} from 'node:fs/promises'
import type {BootstrapConfig, Step, StepContext} from '../../core/index.js'
import {firstLine} from '../../core/index.js'
import {CommandLaunchError} from '../../errors.js'
import {fileExists} from '../host.js'
import {currentTimezone} from './system.js'
import type {BootstrapRun} from './types.js'

export type SummaryRow = [label: string, value: string]

export function renderSummary(rows: SummaryRow[]): string {
  const width = Math.max(...rows.map(([label]) => label.length)) + 1
  const lines = rows.map(([label, value]) => `${`${label}:`.padEnd(width + 1)}${value}`)
  return [
    '========= Installed Tools Summary =========',
    ...lines,
    '==========================================='
  ].join('\n')
}

/** First line of a probe's output (stdout, else stderr). */
async function probeOutput<C>(ctx: StepContext<C>, [file, ...args]: string[]): Promise<string> {
  try {
    const result = await ctx.exec(file, args, {allowFailure: true, quiet: true})
    if (result.exitCode !== 0 && !result.stdout && !result.stderr) {
      return `exited with code ${result.exitCode}`
    }

    return firstLine(result.stdout) || firstLine(result.stderr)
  } catch (error) {
    if (error instanceof CommandLaunchError) {
      return 'not installed'
    }

    throw error
  }
}

async function recordedPublicIp(run: BootstrapRun, file: string): Promise<string> {
  if (run.publicIp) {
    return run.publicIp
  }

  return await fileExists(file) ? firstLine(await readFile(file, 'utf8')) : 'unknown'
}

export function summaryStep(config: BootstrapConfig): Step<BootstrapRun> {
  return {
    id: 'summary',
    name: 'Summarize installed tools',
    async action(ctx) {
      const rows: SummaryRow[] = [['Timezone', await currentTimezone(ctx) ?? 'unknown']]

      for (const spec of config.packages) {
        for (const probe of spec.probes) {
          rows.push([probe[0], await probeOutput(ctx, probe)])
        }
      }

      const {sshKey, publicIp} = config
      rows.push(
        ['aws', await probeOutput(ctx, ['aws', '--version'])],
        ['SSH key', `${sshKey.path} / ${sshKey.path}.pub`],
        ['Copy to', sshKey.copyPath],
        ['Public IP', `${await recordedPublicIp(ctx.run, publicIp.file)} (saved to ${publicIp.file})`]
      )

      return renderSummary(rows)
    }
  }
}
