/**
 * Operation Slot
 *
 * At most one live worker per logical operation ("load folders",
 * "expand node", ...). Re-entering the operation cancels the previous worker
 * and submits the replacement; the old one still delivers its own terminal
 * callback (normally onCancel) when it unwinds.
 */

import type { WorkRequest } from './request'
import type { Worker } from './worker'
import type { WorkerPool } from './workerPool'

export type OperationSlot = {
  readonly name: string
  /** Cancel the live worker, if any, then submit `request` */
  replace: <T>(request: WorkRequest<T>) => Worker<T>
  /** Cancel the live worker; false if there was none */
  cancel: () => boolean
  current: () => Worker<unknown> | null
  isBusy: () => boolean
}

export function createOperationSlot(
  pool: Pick<WorkerPool, 'submit'>,
  name: string,
): OperationSlot {
  let live: Worker<unknown> | null = null

  const cancel = () => {
    if (!live) return false
    const previous = live
    live = null
    return previous.cancel()
  }

  return {
    name,
    replace: <T>(request: WorkRequest<T>): Worker<T> => {
      cancel()
      const worker = pool.submit({ ...request, label: request.label ?? name })
      live = worker
      void worker.whenSettled().then(() => {
        // A superseded worker settling late must not clear its replacement
        if (live === worker) live = null
      })
      return worker
    },
    cancel,
    current: () => live,
    isBusy: () => live !== null,
  }
}
