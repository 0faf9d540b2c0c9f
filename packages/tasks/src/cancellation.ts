/**
 * Cancellation
 *
 * A one-way flag shared between the side that submits work and the body that
 * runs it. The flag lives in a SharedArrayBuffer and is accessed with Atomics,
 * so a worker thread holding the same buffer sees `request()` immediately,
 * even while it is blocked in synchronous code between checkpoints.
 */

const FLAG_INDEX = 0
const REQUESTED = 1

export const CANCELLATION_BUFFER_BYTES = Int32Array.BYTES_PER_ELEMENT

export type CancellationToken = {
  /** Set the flag. Idempotent, callable from any thread. */
  request: () => void
  /** Current flag state. Never blocks. */
  isRequested: () => boolean
  /** Shared memory backing the flag */
  readonly buffer: SharedArrayBuffer
}

/**
 * Create a token. Pass an existing buffer to get a view over a flag owned by
 * another thread.
 */
export function createCancellationToken(
  buffer: SharedArrayBuffer = new SharedArrayBuffer(CANCELLATION_BUFFER_BYTES),
): CancellationToken {
  if (buffer.byteLength !== CANCELLATION_BUFFER_BYTES) {
    throw new TypeError(
      `Cancellation buffer must be ${CANCELLATION_BUFFER_BYTES} bytes, got ${buffer.byteLength}`,
    )
  }
  const flag = new Int32Array(buffer)

  return {
    request: () => {
      Atomics.store(flag, FLAG_INDEX, REQUESTED)
    },
    isRequested: () => Atomics.load(flag, FLAG_INDEX) === REQUESTED,
    buffer,
  }
}

/**
 * Raised by `WorkContext.checkCancelled()` once cancellation was requested.
 * The execution harness turns it into the cancelled outcome, never an error.
 */
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message)
    this.name = 'CancelledError'
  }
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}
