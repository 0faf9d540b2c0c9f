import type { WorkContext } from './context'

/**
 * Task body: may throw or reject.
 * In-process bodies run on the event loop, so a synchronous blocking call
 * (execSync, a long CPU loop) stalls callback delivery until it returns.
 * Blocking work belongs in a thread task, see `createThreadRunner`.
 */
export type TaskBody<T> = (ctx: WorkContext) => T | Promise<T>

/**
 * Work request
 * The task body plus the callbacks to deliver on the main thread.
 * Callbacks left unset are simply not invoked.
 */
export type WorkRequest<T> = Readonly<{
  /** Name used in logs and lifecycle events */
  label?: string
  run: TaskBody<T>
  onDone?: (result: T) => void
  onError?: (message: string) => void
  onProgress?: (percent: number, message: string) => void
  onCancel?: () => void
}>

/**
 * Build an immutable request
 *
 * @example
 * ```ts
 * const request = createWorkRequest({
 *   label: 'load-folders',
 *   run: async (ctx) => {
 *     ctx.checkCancelled()
 *     return listFolders()
 *   },
 *   onDone: (folders) => render(folders),
 *   onError: (message) => showError(message),
 * })
 * ```
 */
export function createWorkRequest<T>(request: WorkRequest<T>): WorkRequest<T> {
  return Object.freeze({ ...request })
}
