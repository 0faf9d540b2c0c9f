/**
 * Thread Tasks - Core
 *
 * Task bodies that must block (CPU-bound loops, synchronous I/O,
 * Atomics.wait) run on a worker_threads thread. Closures cannot cross a
 * thread boundary, so those tasks are defined as data in a registry that both
 * sides import: the main side picks a task by name, the thread runs it.
 *
 * - Task input and output described by zod schemas
 * - Wire events validated on receipt
 * - Cancellation travels as shared memory, progress as messages
 */

import { z } from 'zod'
import type { ZodType } from 'zod'
import type { WorkContext } from '../context'

/**
 * Task definition
 * `execute` gets the same WorkContext as an in-process body.
 */
export type ThreadTaskDefinition<
  TInput extends ZodType,
  TOutput extends ZodType,
> = {
  input: TInput
  output: TOutput
  execute(
    input: z.output<TInput>,
    ctx: WorkContext,
  ): z.input<TOutput> | Promise<z.input<TOutput>>
  /** Validate input and output inside the thread */
  parseIO?: boolean
}

export type AnyThreadTask = ThreadTaskDefinition<ZodType, ZodType>

/**
 * Registry of tasks
 * Use `as const` when defining tasks for better type inference
 */
export type TaskRegistry = Record<string, AnyThreadTask>

export type TaskName<TTasks extends TaskRegistry> = keyof TTasks & string

export type InferInput<T extends AnyThreadTask> = z.input<T['input']>

export type InferOutput<T extends AnyThreadTask> = z.output<T['output']>

/**
 * Define a task with type inference
 */
export function defineTask<TInput extends ZodType, TOutput extends ZodType>(
  definition: ThreadTaskDefinition<TInput, TOutput>,
): ThreadTaskDefinition<TInput, TOutput> {
  return definition
}

// ============================================================================
// Wire protocol
// ============================================================================

/**
 * Event type keywords
 * Use these instead of raw strings
 */
export const eventKeywords = {
  taskRequest: 'task/request',
  workerReady: 'worker/ready',
  taskProgress: 'task/progress',
  taskComplete: 'task/complete',
  taskError: 'task/error',
  taskCancelled: 'task/cancelled',
} as const

/** Task request event (Client → Thread) */
export const clientEventSchema = z.object({
  type: z.literal(eventKeywords.taskRequest),
  taskId: z.string(),
  taskName: z.string(),
  input: z.unknown(), // Validated against the task's own schema
  cancellation: z.instanceof(SharedArrayBuffer),
})

/** Events sent back (Thread → Client) */
export const workerEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(eventKeywords.workerReady),
    timestamp: z.number(),
  }),
  z.object({
    type: z.literal(eventKeywords.taskProgress),
    taskId: z.string(),
    percent: z.number(),
    message: z.string(),
  }),
  z.object({
    type: z.literal(eventKeywords.taskComplete),
    taskId: z.string(),
    output: z.unknown(),
  }),
  z.object({
    type: z.literal(eventKeywords.taskError),
    taskId: z.string(),
    error: z.string(),
  }),
  z.object({
    type: z.literal(eventKeywords.taskCancelled),
    taskId: z.string(),
  }),
])

export type ClientEvent = z.infer<typeof clientEventSchema>

export type WorkerEvent = z.infer<typeof workerEventSchema>
