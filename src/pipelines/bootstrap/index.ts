import type {BootstrapConfig, Pipeline} from '../../core/index.js'
import {awsCliStep, essentialUtilitiesStep, packageStep} from './packages.js'
import {publicIpStep} from './public-ip.js'
import {sshKeyCopyStep, sshKeyStep} from './ssh-key.js'
import {summaryStep} from './summary.js'
import {systemUpdateStep, timezoneStep} from './system.js'
import type {BootstrapRun, PublicIpResolver} from './types.js'

export type BootstrapDependencies = {
  resolvePublicIp?: PublicIpResolver;
}

/**
 * Host bootstrap: system update, timezone, packages, AWS CLI, SSH key,
 * public IP, summary. The key is generated before it is copied, and the
 * summary runs last so it sees everything installed.
 */
export function createBootstrapPipeline(config: BootstrapConfig, deps: BootstrapDependencies = {}): Pipeline<BootstrapRun> {
  return {
    name: 'bootstrap',
    steps: [
      systemUpdateStep(),
      timezoneStep(config.timezone),
      essentialUtilitiesStep(config.essentialPackages),
      ...config.packages.map(spec => packageStep(spec)),
      awsCliStep(config.awsCli.url),
      sshKeyStep(config.sshKey),
      sshKeyCopyStep(config.sshKey),
      publicIpStep(config.publicIp, deps.resolvePublicIp),
      summaryStep(config)
    ]
  }
}

export function createBootstrapRun(): BootstrapRun {
  return {}
}

export {fetchPublicIp, parsePublicIp} from './public-ip.js'
export {renderSummary, type SummaryRow} from './summary.js'
export type {BootstrapRun, PublicIpResolver} from './types.js'
