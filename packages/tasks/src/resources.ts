/**
 * Engine Resources
 *
 * Braided resources wiring the queue, its dispatch loop and a worker pool.
 * Resources are started in dependency order and halted in reverse order:
 *
 *   mainQueue
 *       ↓
 *   dispatchLoop ← mainQueue
 *       ↓
 *   workerPool ← mainQueue, dispatchLoop
 *
 * The pool halts first: it cancels in-flight workers and waits for their
 * terminal callbacks while the loop is still draining.
 */

import { defineResource } from 'braided'
import type { StartedResource } from 'braided'
import { z } from 'zod'
import { createDispatchLoop, dispatchLoopConfigSchema } from './dispatchLoop'
import type { DispatchLoopConfig } from './dispatchLoop'
import type { Logger } from './logger'
import { createMainThreadQueue } from './mainQueue'
import type { MainThreadQueueOptions } from './mainQueue'
import { createWorkerPool, workerPoolConfigSchema } from './workerPool'
import type { WorkerPoolConfig } from './workerPool'

export function createMainQueueResource(options: MainThreadQueueOptions = {}) {
  return defineResource({
    start: () => createMainThreadQueue(options),
    halt: (queue) => {
      queue.clear()
    },
  })
}
type MainQueue = StartedResource<ReturnType<typeof createMainQueueResource>>

export function createDispatchLoopResource(config: DispatchLoopConfig = {}) {
  return defineResource({
    dependencies: ['mainQueue'],
    start: ({ mainQueue }: { mainQueue: MainQueue }) => {
      const loop = createDispatchLoop({ ...config, queue: mainQueue })
      loop.start()
      return loop
    },
    halt: (loop) => {
      loop.stop()
    },
  })
}
type DispatchLoop = StartedResource<ReturnType<typeof createDispatchLoopResource>>

export function createWorkerPoolResource(
  config: WorkerPoolConfig = {},
  logger: Logger = console,
) {
  return defineResource({
    dependencies: ['mainQueue', 'dispatchLoop'],
    start: ({
      mainQueue,
    }: {
      mainQueue: MainQueue
      dispatchLoop: DispatchLoop
    }) => createWorkerPool({ ...config, queue: mainQueue, logger }),
    halt: async (pool) => {
      pool.cancelAll()
      await pool.whenIdle()
    },
  })
}

export const engineConfigSchema = z.object({
  pool: workerPoolConfigSchema.optional(),
  loop: dispatchLoopConfigSchema.optional(),
})

export type EngineConfig = z.input<typeof engineConfigSchema>

export type EngineOptions = EngineConfig & {
  logger?: Logger
}

/**
 * System configuration for `startSystem`
 *
 * @example
 * ```ts
 * const { system } = await startSystem(createEngineSystem({ pool: { name: 'ui' } }))
 * system.workerPool.submit(request)
 * // ...
 * await haltSystem(config, system)
 * ```
 */
export function createEngineSystem(options: EngineOptions = {}) {
  const { logger = console } = options
  const { pool, loop } = engineConfigSchema.parse({
    pool: options.pool,
    loop: options.loop,
  })
  return {
    mainQueue: createMainQueueResource({ logger }),
    dispatchLoop: createDispatchLoopResource(loop),
    workerPool: createWorkerPoolResource(pool, logger),
  }
}
