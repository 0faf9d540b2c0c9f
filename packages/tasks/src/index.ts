/**
 * @offload/tasks
 *
 * Background work for interactive applications: run slow operations off the
 * main thread's path, cancel them cooperatively, and get progress and results
 * back on the main thread, one closure at a time.
 *
 * Philosophy:
 * - Task bodies are opaque functions; the engine guarantees delivery, not presentation
 * - Exactly one terminal callback per worker
 * - Cancellation is cooperative: checkpoints, never pre-emption
 *
 * @example
 * ```ts
 * import { createDispatchLoop, createMainThreadQueue, createWorkerPool, createWorkRequest } from '@offload/tasks'
 *
 * const queue = createMainThreadQueue()
 * createDispatchLoop({ queue }).start()
 * const pool = createWorkerPool({ queue })
 *
 * const worker = pool.submit(createWorkRequest({
 *   run: async (ctx) => {
 *     for (let step = 1; step <= 10; step++) {
 *       ctx.checkCancelled()
 *       await doStep(step)
 *       ctx.progress(step * 10, `Step ${step} of 10`)
 *     }
 *     return 'Done.'
 *   },
 *   onProgress: (percent, message) => render(percent, message),
 *   onDone: (result) => render(100, result),
 *   onCancel: () => render(0, 'Cancelled'),
 *   onError: (message) => showError(message),
 * }))
 *
 * cancelButton.onClick(() => worker.cancel())
 * ```
 */

// ============================================================================
// Work model
// ============================================================================

export * from './cancellation'
export * from './context'
export * from './request'
export * from './outcome'

// ============================================================================
// Main-thread delivery
// ============================================================================

export * from './mainQueue'
export * from './dispatchLoop'

// ============================================================================
// Workers
// ============================================================================

export * from './worker'
export * from './workerPool'
export * from './operationSlot'

// ============================================================================
// Thread Tasks
// ============================================================================

export * from './threads'

// ============================================================================
// Resources, events, state
// ============================================================================

export * from './resources'
export * from './eventBus'
export * from './state'
export * from './callbacks'
export * from './logger'
