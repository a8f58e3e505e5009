import {setTimeout} from 'node:timers/promises'
import type {ProcessExit} from './types.js'

export type StopSignal = 'SIGTERM' | 'SIGKILL'

/** Low-level operations a background process handle is built from. */
export type ProcessControl = {
  pid: number | undefined;
  /** Settles once the process has exited, never rejects. */
  exited: Promise<ProcessExit>;
  kill(signal: StopSignal): void;
  /** Lets the current process exit while the child keeps running. */
  unref(): void;
}

/**
 * Supervised handle on a long-running background process.
 *
 * The handle tracks whether the process is still alive and gives it an explicit
 * end of life: `stop()` terminates it (SIGTERM, then SIGKILL after a grace
 * period), `detach()` hands it over so it outlives the current process.
 */
export class BackgroundProcess {
  static get stopGraceMs() {
    return 5000
  }

  readonly exited: Promise<ProcessExit>
  private exit?: ProcessExit
  private detached = false

  constructor(private readonly control: ProcessControl) {
    this.exited = control.exited.then(exit => {
      this.exit = exit
      return exit
    })
  }

  get pid(): number | undefined {
    return this.control.pid
  }

  get isDetached(): boolean {
    return this.detached
  }

  /** Exit information, once the process has ended. */
  get exitInfo(): ProcessExit | undefined {
    return this.exit
  }

  hasExited(): boolean {
    return this.exit !== undefined
  }

  async stop(graceMs = BackgroundProcess.stopGraceMs): Promise<ProcessExit> {
    if (this.exit) {
      return this.exit
    }

    this.control.kill('SIGTERM')
    const controller = new AbortController()
    const outcome = await Promise.race([
      this.exited,
      setTimeout(graceMs, undefined, {signal: controller.signal}).then(() => undefined, () => undefined)
    ])
    controller.abort()

    if (outcome === undefined) {
      this.control.kill('SIGKILL')
      return this.exited
    }

    return outcome
  }

  detach(): void {
    this.detached = true
    this.control.unref()
  }
}
