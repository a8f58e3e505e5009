import {mkdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {BackendSettings, Step} from '../../core/index.js'
import {exponentialBackoff, pollUntil} from '../../core/index.js'
import type {BackgroundProcess, BackgroundRequest, ProcessExit} from '../../engine/index.js'
import {CredentialNotFoundError, DevServerExitedError, DevServerNotReadyError} from '../../errors.js'
import {fileExists} from '../host.js'
import type {BackendRun} from './types.js'

export const TOKEN_FILE_WARNING = '⚠️ This token file is for demonstration purposes only. Do NOT use this method in production.'

/** Resolves to true when the server at `address` answers as ready. */
export type HealthCheck = (address: string) => Promise<boolean>

export type VaultSettings = BackendSettings['vault']

export type SpawnFn = (request: BackgroundRequest) => BackgroundProcess

/**
 * Asks `/v1/sys/health`. A dev server answers 200 once it is initialized,
 * unsealed and active; anything else, including no answer, is "not ready".
 */
export async function checkVaultHealth(address: string): Promise<boolean> {
  try {
    const response = await fetch(new URL('/v1/sys/health', address), {signal: AbortSignal.timeout(2000)})
    return response.ok
  } catch {
    return false
  }
}

/** Finds the `Root Token: <value>` line a dev server prints at startup. */
export function extractRootToken(log: string): string | undefined {
  const match = /^Root Token:\s*(\S+)\s*$/m.exec(log)
  return match?.[1]
}

/**
 * A Vault server in dev mode (in-memory storage, unsealed, root token in
 * its log), run as a supervised background process.
 */
export class VaultDevServer {
  static start(spawn: SpawnFn, settings: VaultSettings, healthCheck: HealthCheck = checkVaultHealth): VaultDevServer {
    const handle = spawn({
      file: 'vault',
      args: ['server', '-dev', `-dev-listen-address=${new URL(settings.address).host}`],
      logFile: settings.logFile
    })
    return new VaultDevServer(handle, settings, healthCheck)
  }

  constructor(
    private readonly handle: BackgroundProcess,
    private readonly settings: VaultSettings,
    private readonly healthCheck: HealthCheck = checkVaultHealth
  ) {}

  get pid(): number | undefined {
    return this.handle.pid
  }

  /**
   * Probes the health endpoint with exponential backoff.
   * @throws DevServerExitedError when the process dies while we wait
   * @throws DevServerNotReadyError when the attempts run out
   */
  async waitUntilReady(): Promise<void> {
    const result = await pollUntil({
      probe: async () => {
        this.assertRunning()
        return this.healthCheck(this.settings.address)
      },
      until: ready => ready,
      maxAttempts: this.settings.readiness.maxAttempts,
      delayMs: this.backoff()
    })

    if (!result.reached) {
      this.assertRunning()
      throw new DevServerNotReadyError(result.attempts)
    }
  }

  async readRootToken(): Promise<string> {
    const result = await pollUntil({
      probe: async () => extractRootToken(await readLog(this.settings.logFile)),
      until: token => token !== undefined,
      maxAttempts: this.settings.readiness.maxAttempts,
      delayMs: this.backoff()
    })

    if (result.reached && result.value !== undefined) {
      return result.value
    }

    throw new CredentialNotFoundError(this.settings.logFile)
  }

  async stop(): Promise<ProcessExit> {
    return this.handle.stop()
  }

  /** Leaves the server running after this process exits. */
  detach(): void {
    this.handle.detach()
  }

  private assertRunning(): void {
    if (this.handle.hasExited()) {
      throw new DevServerExitedError(this.handle.exitInfo?.exitCode)
    }
  }

  private backoff(): (attempt: number) => number {
    const {initialDelayMs, maxDelayMs} = this.settings.readiness
    return exponentialBackoff({initialDelayMs, maxDelayMs})
  }
}

async function readLog(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return ''
    }

    throw error
  }
}

/**
 * Writes the token to a fresh 0600 file renamed over `path`, so the token
 * never lands in a previous file with looser permissions.
 */
export async function writeTokenFile(path: string, token: string): Promise<void> {
  await mkdir(dirname(path), {recursive: true})
  const staging = `${path}.${process.pid}.tmp`
  try {
    await writeFile(staging, `${TOKEN_FILE_WARNING}\n${token}\n`, {mode: 0o600, flag: 'wx'})
    await rename(staging, path)
  } catch (error) {
    await rm(staging, {force: true})
    throw error
  }
}

/**
 * Starts a dev server, waits for it, then stores its root token and pid.
 * Skipped when a token file exists and a server already answers.
 *
 * On success the server handle is left in `run.vault`; the caller decides
 * whether it outlives the process. On failure the server is stopped.
 */
export function vaultDevServerStep(settings: VaultSettings, healthCheck: HealthCheck = checkVaultHealth): Step<BackendRun> {
  return {
    id: 'vault-dev-server',
    name: 'Start Vault dev server',
    async precondition() {
      return await fileExists(settings.tokenFile) && await healthCheck(settings.address)
    },
    async action(ctx) {
      const server = VaultDevServer.start(ctx.spawn, settings, healthCheck)
      ctx.run.vault = server
      ctx.log(`Vault dev server starting (pid ${server.pid ?? 'unknown'}), log: ${settings.logFile}`)

      try {
        await server.waitUntilReady()
        const token = await server.readRootToken()
        await writeTokenFile(settings.tokenFile, token)
        if (server.pid !== undefined) {
          await mkdir(dirname(settings.pidFile), {recursive: true})
          await writeFile(settings.pidFile, `${server.pid}\n`)
        }
      } catch (error) {
        ctx.run.vault = undefined
        await server.stop()
        throw error
      }

      ctx.log(`Vault dev server ready at ${settings.address}`)
      ctx.log(`Root token saved to ${settings.tokenFile}`)
      ctx.warn(TOKEN_FILE_WARNING)
    },
    async postcondition() {
      return healthCheck(settings.address)
    }
  }
}

export type SignalFn = (pid: number, signal: NodeJS.Signals) => void

/**
 * Stops a detached dev server through its pid file and removes the file.
 */
export async function stopVaultFromPidFile(
  pidFile: string,
  signal: SignalFn = (pid, name) => {
    process.kill(pid, name)
  }
): Promise<'stopped' | 'not-running'> {
  let content: string
  try {
    content = await readFile(pidFile, 'utf8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return 'not-running'
    }

    throw error
  }

  const pid = Number.parseInt(content.trim(), 10)
  let outcome: 'stopped' | 'not-running' = 'not-running'
  if (Number.isInteger(pid) && pid > 0) {
    try {
      signal(pid, 'SIGTERM')
      outcome = 'stopped'
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ESRCH') {
        throw error
      }
    }
  }

  await rm(pidFile, {force: true})
  return outcome
}
