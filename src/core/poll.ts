import {setTimeout} from 'node:timers/promises'

/**
 * Outcome of a bounded poll. Exhaustion is a value, not an exception: the
 * caller decides whether it is fatal.
 */
export type PollResult<T> =
  | {reached: true; attempts: number; value: T}
  | {reached: false; attempts: number; lastValue?: T}

/** Fixed delay in milliseconds, or a function of the attempt that just failed (1-based). */
export type DelayStrategy = number | ((attempt: number) => number)

export type PollOptions<T> = {
  probe: (attempt: number) => Promise<T>;
  until: (value: T) => boolean;
  /** Upper bound on probe calls. Values below 1 are treated as 1. */
  maxAttempts: number;
  delayMs: DelayStrategy;
  /** Called after each probe that did not reach the target. */
  onAttempt?: (value: T, attempt: number) => void;
}

/**
 * Calls `probe` until `until` accepts its value or `maxAttempts` is spent.
 * Sleeps between attempts only, never after the last one.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<PollResult<T>> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts))
  let lastValue: T | undefined

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const value = await options.probe(attempt)
    if (options.until(value)) {
      return {reached: true, attempts: attempt, value}
    }

    lastValue = value
    options.onAttempt?.(value, attempt)

    if (attempt < maxAttempts) {
      await setTimeout(delayFor(options.delayMs, attempt))
    }
  }

  return {reached: false, attempts: maxAttempts, lastValue}
}

export function exponentialBackoff(options: {initialDelayMs: number; maxDelayMs: number; factor?: number}): (attempt: number) => number {
  const factor = options.factor ?? 2
  return attempt => Math.min(options.maxDelayMs, options.initialDelayMs * (factor ** (attempt - 1)))
}

function delayFor(strategy: DelayStrategy, attempt: number): number {
  return typeof strategy === 'number' ? strategy : strategy(attempt)
}
