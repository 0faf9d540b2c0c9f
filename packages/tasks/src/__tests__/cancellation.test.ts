import { describe, expect, it } from 'vitest'
import {
  CANCELLATION_BUFFER_BYTES,
  CancelledError,
  createCancellationToken,
  isCancelledError,
} from '@offload/tasks'

describe('createCancellationToken', () => {
  it('should start unset', () => {
    const token = createCancellationToken()

    expect(token.isRequested()).toBe(false)
  })

  it('should stay set after repeated requests', () => {
    const token = createCancellationToken()

    token.request()
    token.request()
    token.request()

    expect(token.isRequested()).toBe(true)
  })

  it('should share the flag with a view over the same buffer', () => {
    const owner = createCancellationToken()
    const view = createCancellationToken(owner.buffer)

    expect(view.isRequested()).toBe(false)
    owner.request()
    expect(view.isRequested()).toBe(true)
  })

  it('should let the view set the flag for the owner', () => {
    const owner = createCancellationToken()
    const view = createCancellationToken(owner.buffer)

    view.request()

    expect(owner.isRequested()).toBe(true)
  })

  it('should reject a buffer of the wrong size', () => {
    expect(() => createCancellationToken(new SharedArrayBuffer(8))).toThrow(
      `Cancellation buffer must be ${CANCELLATION_BUFFER_BYTES} bytes, got 8`,
    )
  })
})

describe('CancelledError', () => {
  it('should be recognised by isCancelledError', () => {
    const error = new CancelledError()

    expect(error.name).toBe('CancelledError')
    expect(error.message).toBe('Operation cancelled')
    expect(isCancelledError(error)).toBe(true)
  })

  it('should not match ordinary errors', () => {
    expect(isCancelledError(new Error('Operation cancelled'))).toBe(false)
    expect(isCancelledError('CancelledError')).toBe(false)
  })
})
