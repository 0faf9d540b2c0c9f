/**
 * Thread Tasks - Thread Side
 *
 * Receives task requests, runs them through the execution harness and sends
 * back progress and exactly one terminal event per request.
 *
 * Dependencies:
 * - braided: Resource composition system
 * - ./core: Wire protocol and task registry types
 */

import { defineResource, startSystem } from 'braided'
import type { StartedResource } from 'braided'
import { parentPort } from 'node:worker_threads'
import type { MessagePort } from 'node:worker_threads'
import { createCancellationToken } from '../cancellation'
import { createWorkContext } from '../context'
import type { Logger } from '../logger'
import { outcomeKeywords, runTaskBody, toErrorMessage } from '../outcome'
import type { ClientEvent, TaskRegistry, WorkerEvent } from './core'
import { clientEventSchema, eventKeywords } from './core'

/**
 * The thread's end of the channel
 */
export type ServerPort = {
  postMessage: (event: WorkerEvent) => void
  addListener: (listener: (data: unknown) => void) => () => void
}

export function fromMessagePort(port: MessagePort): ServerPort {
  return {
    postMessage: (event) => port.postMessage(event),
    addListener: (listener) => {
      port.on('message', listener)
      return () => {
        port.off('message', listener)
      }
    },
  }
}

/**
 * Execute a task and send results back to the client
 * Never throws: every path ends in one terminal event.
 */
export const executeTask = async (
  event: ClientEvent,
  tasks: TaskRegistry,
  send: (event: WorkerEvent) => void,
): Promise<void> => {
  const { taskId, taskName } = event
  const task = tasks[taskName]
  if (!task) {
    send({ type: eventKeywords.taskError, taskId, error: `Unknown task: ${taskName}` })
    return
  }

  const ctx = createWorkContext(
    createCancellationToken(event.cancellation),
    (percent, message) => {
      send({ type: eventKeywords.taskProgress, taskId, percent, message })
    },
  )

  const outcome = await runTaskBody(async (context) => {
    if (!task.parseIO) {
      return task.execute(event.input, context)
    }

    const input = task.input.safeParse(event.input)
    if (!input.success) {
      throw new Error(`Invalid input: ${input.error.message}`)
    }
    const output = task.output.safeParse(await task.execute(input.data, context))
    if (!output.success) {
      throw new Error(`Invalid output: ${output.error.message}`)
    }
    return output.data
  }, ctx)

  switch (outcome.type) {
    case outcomeKeywords.done:
      send({ type: eventKeywords.taskComplete, taskId, output: outcome.result })
      return
    case outcomeKeywords.error:
      send({ type: eventKeywords.taskError, taskId, error: outcome.message })
      return
    case outcomeKeywords.cancelled:
      send({ type: eventKeywords.taskCancelled, taskId })
      return
  }
}

export type ThreadServer = {
  /** Listen for requests and announce readiness */
  start: () => void
  stop: () => void
  /** Requests currently executing */
  inFlight: () => number
}

export function createThreadServer(
  tasks: TaskRegistry,
  port: ServerPort,
  logger: Logger = console,
): ThreadServer {
  let unsubscribe: (() => void) | null = null
  let inFlight = 0

  const send = (event: WorkerEvent) => {
    try {
      port.postMessage(event)
    } catch (error) {
      // An output that cannot be cloned still has to end the task
      if (event.type === eventKeywords.taskComplete) {
        port.postMessage({
          type: eventKeywords.taskError,
          taskId: event.taskId,
          error: `Cannot send output: ${toErrorMessage(error)}`,
        })
        return
      }
      throw error
    }
  }

  const handleMessage = (data: unknown) => {
    const parsed = clientEventSchema.safeParse(data)
    if (!parsed.success) {
      logger.warn('[Thread] Ignoring malformed request:', parsed.error.message)
      return
    }

    inFlight += 1
    executeTask(parsed.data, tasks, send)
      .catch((error: unknown) => {
        logger.error(`[Thread] Failed to report ${parsed.data.taskName}:`, error)
      })
      .finally(() => {
        inFlight -= 1
      })
  }

  return {
    start: () => {
      if (unsubscribe) return
      unsubscribe = port.addListener(handleMessage)
      port.postMessage({ type: eventKeywords.workerReady, timestamp: Date.now() })
    },
    stop: () => {
      unsubscribe?.()
      unsubscribe = null
    },
    inFlight: () => inFlight,
  }
}

// ============================================================================
// Thread system
// ============================================================================

/**
 * Create the thread-side system for a task registry
 *
 * transport (port) ← server (requests → harness → events)
 */
export function createThreadSystem<T extends TaskRegistry>(
  tasks: T,
  port: ServerPort,
  logger: Logger = console,
) {
  const threadTransport = defineResource({
    start: () => port,
  })
  type ThreadTransport = StartedResource<typeof threadTransport>

  const threadServer = defineResource({
    dependencies: ['threadTransport'],
    start: ({ threadTransport }: { threadTransport: ThreadTransport }) => {
      const server = createThreadServer(tasks, threadTransport, logger)
      server.start()
      return server
    },
    halt: (server) => {
      server.stop()
    },
  })

  return {
    threadTransport,
    threadServer,
  }
}

/**
 * Thread entry point
 *
 * @example
 * ```ts
 * // thread.ts
 * import { serveTasks } from '@offload/tasks'
 * import { tasks } from './tasks'
 *
 * serveTasks(tasks)
 * ```
 */
export async function serveTasks<T extends TaskRegistry>(
  tasks: T,
  logger: Logger = console,
): Promise<void> {
  if (!parentPort) {
    throw new Error('serveTasks must run inside a worker thread')
  }

  const { errors } = await startSystem(
    createThreadSystem(tasks, fromMessagePort(parentPort), logger),
  )
  if (errors.size > 0) {
    errors.forEach((error, resourceId) => {
      logger.error(`[Thread] ${resourceId} failed to start:`, error)
    })
    throw new Error(`Thread system started with ${errors.size} error(s)`)
  }
}
