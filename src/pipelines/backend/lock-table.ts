import type {BackendSettings, Step} from '../../core/index.js'
import {pollUntil} from '../../core/index.js'
import {PollExhaustedError} from '../../errors.js'
import type {LockTableStore} from './stores.js'
import type {BackendRun} from './types.js'

export const ACTIVE_STATUS = 'ACTIVE'

export function lockTableStep(store: LockTableStore): Step<BackendRun> {
  return {
    id: 'lock-table',
    name: 'Create lock table',
    async precondition(ctx) {
      return await store.status(ctx.run.backend.lockTable) !== undefined
    },
    async action(ctx) {
      await store.create(ctx.run.backend.lockTable)
      ctx.log(`DynamoDB table created: ${ctx.run.backend.lockTable}`)
    }
  }
}

/**
 * Polls the table status at a fixed interval until it is ACTIVE.
 * Running out of attempts fails the step, or only warns when
 * `onExhausted` is 'warn'.
 */
export function lockTableActiveStep(store: LockTableStore, poll: BackendSettings['lockTablePoll']): Step<BackendRun> {
  return {
    id: 'lock-table-active',
    name: 'Wait for lock table to become ACTIVE',
    async precondition(ctx) {
      return await store.status(ctx.run.backend.lockTable) === ACTIVE_STATUS
    },
    async action(ctx) {
      const table = ctx.run.backend.lockTable
      const result = await pollUntil({
        probe: async () => store.status(table),
        until: status => status === ACTIVE_STATUS,
        maxAttempts: poll.maxAttempts,
        delayMs: poll.intervalMs,
        onAttempt(status) {
          ctx.log(`Current status: ${status ?? 'not found'}, waiting...`)
        }
      })

      if (result.reached) {
        ctx.log(`Table status is ACTIVE (${result.attempts} checks)`)
        return
      }

      if (poll.onExhausted === 'fail') {
        throw new PollExhaustedError(`table ${table} to become ${ACTIVE_STATUS}`, result.attempts)
      }

      ctx.warn(`Table ${table} still ${result.lastValue ?? 'not found'} after ${result.attempts} checks, continuing`)
    }
  }
}
