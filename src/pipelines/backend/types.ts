import type {BackendConfig} from './backend-config.js'
import type {VaultDevServer} from './vault.js'

/** State shared by the backend steps during one run. */
export type BackendRun = {
  /** Names and settings used both to create resources and to render the backend block. */
  backend: BackendConfig;
  /** Dev server started by this run; the caller must stop or detach it. */
  vault?: VaultDevServer;
}
