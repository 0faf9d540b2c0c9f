/**
 * Thread Tasks
 *
 * Registry-defined tasks executed on worker_threads, exposed as ordinary
 * task bodies for the WorkerPool.
 *
 * @example
 * ```ts
 * // tasks.ts (imported by both sides)
 * export const tasks = {
 *   checksum: defineTask({
 *     input: z.object({ path: z.string() }),
 *     output: z.object({ digest: z.string() }),
 *     execute: (input, ctx) => checksumFile(input.path, ctx),
 *   }),
 * }
 *
 * // thread.ts
 * serveTasks(tasks)
 *
 * // main
 * const runner = createThreadRunner({ tasks, spawn: createNodeThreadSpawner({ script }) })
 * pool.submit(runner.request('checksum', { path }, { onDone: show }))
 * ```
 */

export * from './core'
export * from './client'
export * from './server'
export * from './spawn'
