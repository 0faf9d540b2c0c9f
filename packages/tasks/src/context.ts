/**
 * Work Context
 *
 * The handle a running task body polls and reports through.
 * One context per invocation; closed once the body settles.
 */

import { CancelledError } from './cancellation'
import type { CancellationToken } from './cancellation'

export type ProgressEmitter = (percent: number, message: string) => void

export type WorkContext = {
  /**
   * Checkpoint. Throws `CancelledError` if cancellation was requested,
   * returns normally otherwise.
   */
  checkCancelled: () => void

  /**
   * Queue a progress notification for main-thread delivery.
   * Percent is advisory: not clamped, not checked for monotonicity.
   */
  progress: ProgressEmitter

  /**
   * Shared memory behind the cancellation flag.
   * Hand it to another thread and read it there through a context of its own.
   */
  readonly cancellation: SharedArrayBuffer
}

/**
 * Context plus the bookkeeping the harness needs
 */
export type ManagedWorkContext = WorkContext & {
  /** True once a checkpoint has thrown */
  cancellationObserved: () => boolean
  /** Stop forwarding progress; called when the body settles */
  close: () => void
}

export function createWorkContext(
  token: CancellationToken,
  emit: ProgressEmitter,
): ManagedWorkContext {
  let observed = false
  let closed = false

  return {
    checkCancelled: () => {
      if (token.isRequested()) {
        observed = true
        throw new CancelledError()
      }
    },
    progress: (percent, message) => {
      // Nothing is reported after the body has seen cancellation or returned
      if (closed || observed) return
      emit(percent, message)
    },
    cancellation: token.buffer,
    cancellationObserved: () => observed,
    close: () => {
      closed = true
    },
  }
}
