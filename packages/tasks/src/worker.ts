/**
 * Worker
 *
 * One execution of one WorkRequest.
 *
 *   running ──► done       onDone(result)
 *          ├──► errored    onError(message)
 *          └──► cancelled  onCancel()
 *
 * The body's outcome comes back as a tagged value; the terminal closure posted
 * to the main-thread queue pattern-matches on it. Progress closures are posted
 * to the same queue, so they are delivered first and in emission order.
 */

import { runEach } from './callbacks'
import { createCancellationToken } from './cancellation'
import type { CancellationToken } from './cancellation'
import { createWorkContext } from './context'
import { generateId } from './ids'
import type { MainThreadQueue } from './mainQueue'
import { outcomeKeywords, runTaskBody, toErrorMessage } from './outcome'
import type { WorkOutcome } from './outcome'
import type { WorkRequest } from './request'
import { createAtom } from './state'

export const workerStatusKeywords = {
  running: 'running',
  done: 'done',
  errored: 'errored',
  cancelled: 'cancelled',
} as const

export type WorkerStatus =
  (typeof workerStatusKeywords)[keyof typeof workerStatusKeywords]

export type TerminalStatus = Exclude<WorkerStatus, 'running'>

// T: result type of the running request
export type Worker<T> = {
  readonly id: string
  readonly label: string

  /**
   * Request cooperative cancellation. Returns immediately.
   * Returns false (and does nothing) once the worker is finished.
   */
  cancel: () => boolean

  getStatus: () => WorkerStatus
  isFinished: () => boolean
  isCancelRequested: () => boolean

  /** Resolves after the terminal callback has run on the main thread */
  whenSettled: () => Promise<TerminalStatus>

  subscribe: (listener: (status: WorkerStatus) => void) => () => void
}

/**
 * Hooks the pool uses to observe a worker
 */
export type WorkerHooks = {
  onProgress?: (percent: number, message: string) => void
  onSettled?: (status: TerminalStatus) => void
}

const statusForOutcome = {
  [outcomeKeywords.done]: workerStatusKeywords.done,
  [outcomeKeywords.error]: workerStatusKeywords.errored,
  [outcomeKeywords.cancelled]: workerStatusKeywords.cancelled,
} as const

/**
 * Start a worker. The body is launched on a later event-loop turn, never
 * inside this call.
 */
export function startWorker<T>(
  request: WorkRequest<T>,
  queue: MainThreadQueue,
  hooks: WorkerHooks = {},
): Worker<T> {
  const id = generateId()
  const token: CancellationToken = createCancellationToken()
  const status = createAtom<WorkerStatus>(workerStatusKeywords.running)

  let settle: (status: TerminalStatus) => void = () => {}
  const settled = new Promise<TerminalStatus>((resolve) => {
    settle = resolve
  })

  const isRunning = () => status.get() === workerStatusKeywords.running

  const ctx = createWorkContext(token, (percent, message) => {
    queue.post(() => {
      // Terminal callback already delivered: drop
      if (!isRunning()) return
      runEach([
        () => hooks.onProgress?.(percent, message),
        () => request.onProgress?.(percent, message),
      ])
    })
  })

  const deliver = (outcome: WorkOutcome<T>) => {
    queue.post(() => {
      if (!isRunning()) return

      const terminal = statusForOutcome[outcome.type]

      // Status listeners, the caller's callback and the pool hook may all
      // throw; none of them keeps the others or `whenSettled` from running.
      runEach([
        () => status.set(terminal),
        () => {
          switch (outcome.type) {
            case outcomeKeywords.done:
              request.onDone?.(outcome.result)
              return
            case outcomeKeywords.error:
              request.onError?.(outcome.message)
              return
            case outcomeKeywords.cancelled:
              request.onCancel?.()
              return
          }
        },
        () => hooks.onSettled?.(terminal),
        () => settle(terminal),
      ])
    })
  }

  const launched = new Promise<void>((resolve) => setImmediate(resolve))
  launched
    .then(() => runTaskBody(request.run, ctx))
    .then(deliver)
    .catch((error: unknown) => {
      // Harness fault; still ends in exactly one terminal callback
      deliver({ type: outcomeKeywords.error, message: toErrorMessage(error) })
    })

  return {
    id,
    label: request.label ?? 'work',
    cancel: () => {
      if (!isRunning()) return false
      token.request()
      return true
    },
    getStatus: status.get,
    isFinished: () => !isRunning(),
    isCancelRequested: token.isRequested,
    whenSettled: () => settled,
    subscribe: status.subscribe,
  }
}
