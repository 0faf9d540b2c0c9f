/**
 * Execution harness
 *
 * Runs a task body and turns whatever happens into a tagged outcome.
 * Nothing thrown by the body escapes: every run resolves to exactly one
 * of done, error or cancelled.
 */

import { isCancelledError } from './cancellation'
import type { ManagedWorkContext } from './context'
import type { TaskBody } from './request'

export const outcomeKeywords = {
  done: 'work/done',
  error: 'work/error',
  cancelled: 'work/cancelled',
} as const

export type WorkOutcome<T> =
  | { type: typeof outcomeKeywords.done; result: T }
  | { type: typeof outcomeKeywords.error; message: string }
  | { type: typeof outcomeKeywords.cancelled }

/**
 * Render a failure as a display string
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name
  }
  return String(error)
}

export async function runTaskBody<T>(
  body: TaskBody<T>,
  ctx: ManagedWorkContext,
): Promise<WorkOutcome<T>> {
  try {
    const result = await body(ctx)
    // A body that caught the cancellation signal and carried on is still cancelled
    if (ctx.cancellationObserved()) {
      return { type: outcomeKeywords.cancelled }
    }
    return { type: outcomeKeywords.done, result }
  } catch (error) {
    if (isCancelledError(error) || ctx.cancellationObserved()) {
      return { type: outcomeKeywords.cancelled }
    }
    return { type: outcomeKeywords.error, message: toErrorMessage(error) }
  } finally {
    ctx.close()
  }
}
