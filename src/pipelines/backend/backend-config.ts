import type {BackendSettings, Step} from '../../core/index.js'
import type {BackendRun} from './types.js'

/** Terraform S3 backend settings, fixed for the whole run. */
export type BackendConfig = {
  bucket: string;
  lockTable: string;
  region: string;
  /** State object key inside the bucket */
  key: string;
  encrypt: boolean;
}

/**
 * Names default to `<prefix>-<unix seconds>` so each run provisions a fresh
 * pair; configured names take precedence.
 */
export function createBackendConfig(settings: BackendSettings, now: Date = new Date()): BackendConfig {
  const timestamp = Math.floor(now.getTime() / 1000)
  return {
    bucket: settings.bucketName ?? `${settings.bucketPrefix}-${timestamp}`,
    lockTable: settings.lockTableName ?? `${settings.lockTablePrefix}-${timestamp}`,
    region: settings.region,
    key: settings.stateKey,
    encrypt: settings.encrypt
  }
}

export function renderBackendConfig(config: BackendConfig): string {
  return [
    'terraform {',
    '  backend "s3" {',
    `    bucket         = "${config.bucket}"`,
    `    key            = "${config.key}"`,
    `    region         = "${config.region}"`,
    `    dynamodb_table = "${config.lockTable}"`,
    `    encrypt        = ${String(config.encrypt)}`,
    '  }',
    '}'
  ].join('\n')
}

/** Confirmation of what the run provides, followed by the backend block. */
export function renderBackendReport(config: BackendConfig, vaultAddress: string): string {
  return [
    'Terraform installed',
    `Vault running in dev mode at ${vaultAddress}`,
    `S3 bucket ready: ${config.bucket}`,
    `DynamoDB table ready: ${config.lockTable}`,
    '',
    'Use the following backend config in Terraform:',
    renderBackendConfig(config)
  ].join('\n')
}

export function backendConfigStep(vaultAddress: string): Step<BackendRun> {
  return {
    id: 'backend-config',
    name: 'Render Terraform backend config',
    async action(ctx) {
      return renderBackendReport(ctx.run.backend, vaultAddress)
    }
  }
}
