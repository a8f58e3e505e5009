import type {BackendSettings, Pipeline} from '../../core/index.js'
import {backendConfigStep, createBackendConfig} from './backend-config.js'
import {aptUpdateStep, essentialPackagesStep, hashicorpRepositoryStep, hashicorpToolsStep} from './dependencies.js'
import {lockTableActiveStep, lockTableStep} from './lock-table.js'
import {bucketVersioningStep, stateBucketStep} from './state-bucket.js'
import type {BackendStores} from './stores.js'
import type {BackendRun} from './types.js'
import {type HealthCheck, vaultDevServerStep} from './vault.js'

export type BackendDependencies = {
  stores: BackendStores;
  healthCheck?: HealthCheck;
}

/**
 * Backend provisioning: host tooling, state bucket, lock table, Vault dev
 * server, then the rendered backend block. The bucket and table names come
 * from the run, so the rendered block names exactly what was created.
 */
export function createBackendPipeline(settings: BackendSettings, deps: BackendDependencies): Pipeline<BackendRun> {
  return {
    name: 'backend',
    steps: [
      aptUpdateStep(),
      essentialPackagesStep(settings.essentialPackages),
      hashicorpRepositoryStep(settings.hashicorp),
      hashicorpToolsStep(settings.hashicorp.packages),
      stateBucketStep(deps.stores.bucket),
      bucketVersioningStep(deps.stores.bucket),
      lockTableStep(deps.stores.lockTable),
      lockTableActiveStep(deps.stores.lockTable, settings.lockTablePoll),
      vaultDevServerStep(settings.vault, deps.healthCheck),
      backendConfigStep(settings.vault.address)
    ]
  }
}

export function createBackendRun(settings: BackendSettings, now?: Date): BackendRun {
  return {backend: createBackendConfig(settings, now)}
}

export {createBackendConfig, renderBackendConfig, renderBackendReport, type BackendConfig} from './backend-config.js'
export {
  createAwsStores,
  S3StateBucketStore,
  DynamoLockTableStore,
  LOCK_KEY_ATTRIBUTE,
  type BackendStores,
  type StateBucketStore,
  type LockTableStore
} from './stores.js'
export {
  VaultDevServer,
  checkVaultHealth,
  extractRootToken,
  stopVaultFromPidFile,
  writeTokenFile,
  TOKEN_FILE_WARNING,
  type HealthCheck,
  type VaultSettings
} from './vault.js'
export {ACTIVE_STATUS} from './lock-table.js'
export type {BackendRun} from './types.js'
