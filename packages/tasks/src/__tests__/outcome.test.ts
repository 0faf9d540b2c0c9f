import { describe, expect, it } from 'vitest'
import {
  CancelledError,
  createCancellationToken,
  createWorkContext,
  outcomeKeywords,
  runTaskBody,
  toErrorMessage,
} from '@offload/tasks'

const freshContext = () => {
  const token = createCancellationToken()
  return { token, ctx: createWorkContext(token, () => {}) }
}

describe('toErrorMessage', () => {
  it('should use the message of an Error', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom')
  })

  it('should fall back to the name of an Error without message', () => {
    expect(toErrorMessage(new TypeError())).toBe('TypeError')
  })

  it('should stringify anything else', () => {
    expect(toErrorMessage('plain')).toBe('plain')
    expect(toErrorMessage(42)).toBe('42')
  })
})

describe('runTaskBody', () => {
  it('should resolve done with the returned value', async () => {
    const { ctx } = freshContext()

    const outcome = await runTaskBody(() => 'Done.', ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.done, result: 'Done.' })
  })

  it('should resolve done with the value of an async body', async () => {
    const { ctx } = freshContext()

    const outcome = await runTaskBody(async () => [1, 2, 3], ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.done, result: [1, 2, 3] })
  })

  it('should resolve error with the failure message', async () => {
    const { ctx } = freshContext()

    const outcome = await runTaskBody(() => {
      throw new Error('boom')
    }, ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.error, message: 'boom' })
  })

  it('should resolve error for a rejected non-Error value', async () => {
    const { ctx } = freshContext()

    const outcome = await runTaskBody(() => Promise.reject('disk full'), ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.error, message: 'disk full' })
  })

  it('should resolve cancelled when a checkpoint throws', async () => {
    const { token, ctx } = freshContext()
    token.request()

    const outcome = await runTaskBody((context) => {
      context.checkCancelled()
      return 'unreachable'
    }, ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.cancelled })
  })

  it('should resolve cancelled for a thrown CancelledError', async () => {
    const { ctx } = freshContext()

    const outcome = await runTaskBody(() => {
      throw new CancelledError()
    }, ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.cancelled })
  })

  it('should stay cancelled when the body swallows the signal and returns', async () => {
    const { token, ctx } = freshContext()
    token.request()

    const outcome = await runTaskBody((context) => {
      try {
        context.checkCancelled()
      } catch {
        return 'carried on'
      }
      return 'unreachable'
    }, ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.cancelled })
  })

  it('should stay cancelled when the body rethrows a different error', async () => {
    const { token, ctx } = freshContext()
    token.request()

    const outcome = await runTaskBody((context) => {
      try {
        context.checkCancelled()
      } catch {
        throw new Error('cleanup failed')
      }
    }, ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.cancelled })
  })

  it('should finish done when cancellation is requested but never checked', async () => {
    const { token, ctx } = freshContext()
    token.request()

    const outcome = await runTaskBody(() => 7, ctx)

    expect(outcome).toEqual({ type: outcomeKeywords.done, result: 7 })
  })

  it('should close the context once the body settles', async () => {
    const token = createCancellationToken()
    const reported: Array<number> = []
    const ctx = createWorkContext(token, (percent) => reported.push(percent))

    await runTaskBody((context) => {
      context.progress(10, 'inside')
      return null
    }, ctx)
    ctx.progress(20, 'outside')

    expect(reported).toEqual([10])
  })
})
