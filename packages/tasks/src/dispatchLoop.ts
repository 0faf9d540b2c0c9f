/**
 * Dispatch Loop
 *
 * Drives a MainThreadQueue from the event loop: one drain per iteration while
 * there is work, idle (nothing scheduled, process free to exit) otherwise.
 * A post to the queue wakes the loop up again.
 *
 * Philosophy:
 * - Callbacks never run inside the code that produced them
 * - Clean state management (running, paused)
 * - Error handling stays with the queue; the loop only schedules
 */

import { z } from 'zod'
import type { MainThreadQueue } from './mainQueue'

export const dispatchLoopConfigSchema = z.object({
  /**
   * Upper bound on closures run per iteration.
   * Leftovers run on the next iteration so one busy producer cannot
   * monopolise the main thread.
   */
  maxTasksPerTick: z.number().int().positive().optional(),
})

export type DispatchLoopConfig = z.infer<typeof dispatchLoopConfigSchema>

/**
 * Schedules the next iteration and returns a function that unschedules it.
 */
export type LoopScheduler = (tick: () => void) => () => void

export const immediateScheduler: LoopScheduler = (tick) => {
  const immediate = setImmediate(tick)
  return () => clearImmediate(immediate)
}

export type DispatchLoopOptions = DispatchLoopConfig & {
  queue: MainThreadQueue
  /** Defaults to setImmediate */
  scheduler?: LoopScheduler
  /** Called after each drain that ran at least one closure */
  afterDrain?: (delivered: number) => void
}

export type DispatchLoopStats = {
  ticks: number
  delivered: number
}

export type DispatchLoopAPI = {
  /** Start the loop. Safe to call multiple times (idempotent) */
  start: () => void
  /** Stop the loop, cancel any scheduled iteration */
  stop: () => void
  /** Stop draining but keep listening; queued closures are kept */
  pause: () => void
  /** Resume from paused state, draining anything queued meanwhile */
  resume: () => void
  isRunning: () => boolean
  isPaused: () => boolean
  getStats: () => DispatchLoopStats
}

/**
 * Create a dispatch loop
 *
 * @example
 * ```typescript
 * const queue = createMainThreadQueue()
 * const loop = createDispatchLoop({ queue })
 * loop.start()
 *
 * const pool = createWorkerPool({ queue })
 * ```
 */
export function createDispatchLoop(
  options: DispatchLoopOptions,
): DispatchLoopAPI {
  const { queue, afterDrain, scheduler = immediateScheduler } = options
  const { maxTasksPerTick } = dispatchLoopConfigSchema.parse({
    maxTasksPerTick: options.maxTasksPerTick,
  })

  // State
  let running = false
  let paused = false
  let unschedule: (() => void) | null = null
  let unsubscribe: (() => void) | null = null
  const stats: DispatchLoopStats = { ticks: 0, delivered: 0 }

  const tick = () => {
    unschedule = null
    if (!running || paused) return

    stats.ticks += 1
    const delivered = queue.drain(maxTasksPerTick)
    stats.delivered += delivered
    if (delivered > 0) {
      afterDrain?.(delivered)
    }

    // Keep going only while there is work left
    if (queue.size() > 0) {
      wake()
    }
  }

  const wake = () => {
    if (!running || paused || unschedule !== null) return
    unschedule = scheduler(tick)
  }

  const cancelScheduled = () => {
    unschedule?.()
    unschedule = null
  }

  const start = () => {
    if (running) return

    running = true
    paused = false
    unsubscribe = queue.onPost(wake)

    if (queue.size() > 0) {
      wake()
    }
  }

  const stop = () => {
    running = false
    paused = false
    unsubscribe?.()
    unsubscribe = null
    cancelScheduled()
  }

  const pause = () => {
    if (!running || paused) return

    paused = true
    cancelScheduled()
  }

  const resume = () => {
    if (!running || !paused) return

    paused = false
    if (queue.size() > 0) {
      wake()
    }
  }

  return {
    start,
    stop,
    pause,
    resume,
    isRunning: () => running,
    isPaused: () => paused,
    getStats: () => ({ ...stats }),
  }
}
