/**
 * Worker Pool
 *
 * Accepts work requests, starts a Worker per request and routes every
 * callback through the main-thread queue.
 *
 * No concurrency limit, no queue, no back-pressure: each submission gets its
 * own background execution. Callers coordinate related work themselves (see
 * `createOperationSlot`).
 */

import { z } from 'zod'
import { runEach } from './callbacks'
import { createEventBus, defineEvent } from './eventBus'
import type { EventBus } from './eventBus'
import type { Logger } from './logger'
import type { MainThreadQueue } from './mainQueue'
import type { WorkRequest } from './request'
import { createAtom } from './state'
import type { Atom } from './state'
import { startWorker } from './worker'
import type { TerminalStatus, Worker } from './worker'

export const workerPoolConfigSchema = z.object({
  /** Shown in log lines */
  name: z.string().min(1).default('pool'),
  /** Log submissions and settlements, not only failures */
  verbose: z.boolean().default(false),
})

export type WorkerPoolConfig = z.input<typeof workerPoolConfigSchema>

export type WorkerPoolOptions = WorkerPoolConfig & {
  queue: MainThreadQueue
  logger?: Logger
  /**
   * Share a bus with other components. A private one is created otherwise,
   * logging subscriber errors instead of throwing them.
   */
  events?: EventBus
}

export type WorkerPoolStats = {
  submitted: number
  active: number
  done: number
  errored: number
  cancelled: number
}

// ============================================================================
// Lifecycle events
// ============================================================================

export type WorkerSubmittedEvent = { workerId: string; label: string }

export type WorkerProgressEvent = {
  workerId: string
  label: string
  percent: number
  message: string
}

export type WorkerSettledEvent = {
  workerId: string
  label: string
  status: TerminalStatus
}

export const poolEvents = {
  submitted: defineEvent<WorkerSubmittedEvent>('worker:submitted'),
  progress: defineEvent<WorkerProgressEvent>('worker:progress'),
  settled: defineEvent<WorkerSettledEvent>('worker:settled'),
} as const

// ============================================================================
// Pool
// ============================================================================

export type WorkerPool = {
  /**
   * Start a background execution and return its handle right away.
   * Never waits on the task body.
   */
  submit: <T>(request: WorkRequest<T>) => Worker<T>

  /** Workers whose terminal callback has not run yet */
  active: () => Array<Worker<unknown>>

  /** Request cancellation of every active worker; returns how many were asked */
  cancelAll: () => number

  /** Resolves once no worker is active */
  whenIdle: () => Promise<void>

  stats: Atom<WorkerPoolStats>
  events: EventBus
}

const counterForStatus = {
  done: 'done',
  errored: 'errored',
  cancelled: 'cancelled',
} as const satisfies Record<TerminalStatus, keyof WorkerPoolStats>

export function createWorkerPool(options: WorkerPoolOptions): WorkerPool {
  const { queue, logger = console } = options
  const { name, verbose } = workerPoolConfigSchema.parse({
    name: options.name,
    verbose: options.verbose,
  })
  const tag = `[WorkerPool:${name}]`
  const events =
    options.events ??
    createEventBus({
      onError: (error, eventType) => {
        logger.error(`${tag} ${eventType} subscriber failed:`, error)
      },
    })

  const workers = new Set<Worker<unknown>>()
  const stats = createAtom<WorkerPoolStats>({
    submitted: 0,
    active: 0,
    done: 0,
    errored: 0,
    cancelled: 0,
  })
  let idleWaiters: Array<() => void> = []

  const notifyIdle = () => {
    if (workers.size > 0) return
    const waiters = idleWaiters
    idleWaiters = []
    waiters.forEach((resolve) => resolve())
  }

  const submit = <T>(request: WorkRequest<T>): Worker<T> => {
    let handle: Worker<T> | null = null

    const worker = startWorker(request, queue, {
      onProgress: (percent, message) => {
        if (!handle) return
        events.emit(poolEvents.progress, {
          workerId: handle.id,
          label: handle.label,
          percent,
          message,
        })
      },
      onSettled: (status) => {
        if (!handle) return
        const settled = handle
        workers.delete(settled)

        runEach([
          () =>
            stats.update((s) => ({
              ...s,
              active: workers.size,
              [counterForStatus[status]]: s[counterForStatus[status]] + 1,
            })),
          () => {
            if (verbose) {
              logger.log(`${tag} ${settled.label} (${settled.id}) ${status}`)
            }
          },
          () =>
            events.emit(poolEvents.settled, {
              workerId: settled.id,
              label: settled.label,
              status,
            }),
          notifyIdle,
        ])
      },
    })
    handle = worker

    workers.add(worker)
    stats.update((s) => ({
      ...s,
      submitted: s.submitted + 1,
      active: workers.size,
    }))
    if (verbose) {
      logger.log(`${tag} Submitted ${worker.label} (${worker.id})`)
    }
    events.emit(poolEvents.submitted, {
      workerId: worker.id,
      label: worker.label,
    })

    return worker
  }

  return {
    submit,
    active: () => Array.from(workers),
    cancelAll: () => {
      let requested = 0
      workers.forEach((worker) => {
        if (worker.cancel()) requested += 1
      })
      if (requested > 0) {
        logger.log(`${tag} Requested cancellation of ${requested} worker(s)`)
      }
      return requested
    },
    whenIdle: () => {
      if (workers.size === 0) return Promise.resolve()
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve)
      })
    },
    stats,
    events,
  }
}
