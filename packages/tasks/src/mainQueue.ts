/**
 * Main Thread Queue
 *
 * Explicit hand-off point between background execution and the main thread.
 * Anything may `post()` a closure; closures only ever run inside `drain()`,
 * which the dispatch loop calls once per event-loop iteration.
 *
 * Ordering: FIFO. A drain runs only what was queued when it started, so a
 * closure posted by another closure waits for the next iteration.
 */

import type { Logger } from './logger'
import { createListeners } from './state'

export type MainThreadTask = () => void

export type MainThreadQueueOptions = {
  /**
   * Called when a closure throws. The rest of the drain continues.
   * If not provided, errors are logged.
   */
  onError?: (error: unknown) => void
  logger?: Logger
}

export type MainThreadQueue = {
  /** Enqueue a closure for the next drain */
  post: (task: MainThreadTask) => void

  /**
   * Run the closures queued so far, in order.
   * Returns how many ran. Re-entrant calls return 0.
   */
  drain: (limit?: number) => number

  /** True while closures are being run, i.e. we are "on the main thread" */
  isDraining: () => boolean

  size: () => number

  /** Listen for posts (the dispatch loop wakes up on these) */
  onPost: (listener: () => void) => () => void

  clear: () => void
}

export function createMainThreadQueue(
  options: MainThreadQueueOptions = {},
): MainThreadQueue {
  const { onError, logger = console } = options
  const pending: Array<MainThreadTask> = []
  const posts = createListeners<void>()
  let draining = false

  const report = (error: unknown) => {
    if (onError) {
      onError(error)
    } else {
      logger.error('[MainThreadQueue] Callback failed:', error)
    }
  }

  return {
    post: (task) => {
      pending.push(task)
      posts.notify()
    },

    drain: (limit = Number.POSITIVE_INFINITY) => {
      if (draining) return 0

      const count = Math.min(pending.length, limit)
      const batch = pending.splice(0, count)

      draining = true
      try {
        for (const task of batch) {
          try {
            task()
          } catch (error) {
            report(error)
          }
        }
      } finally {
        draining = false
      }

      return batch.length
    },

    isDraining: () => draining,

    size: () => pending.length,

    onPost: (listener) => posts.add(listener),

    clear: () => {
      pending.length = 0
    },
  }
}
