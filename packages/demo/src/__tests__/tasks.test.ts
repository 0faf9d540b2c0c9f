import { describe, expect, it, vi } from 'vitest'
import {
  CANCELLATION_BUFFER_BYTES,
  CancelledError,
  createCancellationToken,
  createWorkContext,
  eventKeywords,
  executeTask,
} from '@offload/tasks'
import type { WorkerEvent } from '@offload/tasks'
import { countPrimes, demoTasks } from '../tasks'

describe('countPrimes', () => {
  it('should count primes and report progress at each checkpoint', () => {
    const progress = vi.fn()
    const ctx = createWorkContext(createCancellationToken(), progress)

    expect(countPrimes(30, 10, ctx)).toEqual({ count: 10, largest: 29 })
    expect(progress.mock.calls).toEqual([
      [33, 'Checked 10 of 30'],
      [66, 'Checked 20 of 30'],
      [100, 'Checked 30 of 30'],
    ])
  })

  it('should stop at the first checkpoint once cancelled', () => {
    const token = createCancellationToken()
    const progress = vi.fn()
    const ctx = createWorkContext(token, progress)
    token.request()

    expect(() => countPrimes(30, 10, ctx)).toThrow(CancelledError)
    expect(progress).not.toHaveBeenCalled()
  })

  it('should report no primes below 2', () => {
    const ctx = createWorkContext(createCancellationToken(), vi.fn())

    expect(countPrimes(1, 10, ctx)).toEqual({ count: 0, largest: null })
  })
})

describe('demoTasks.countPrimes', () => {
  const run = async (input: unknown) => {
    const sent: Array<WorkerEvent> = []
    await executeTask(
      {
        type: eventKeywords.taskRequest,
        taskId: 'primes-1',
        taskName: 'countPrimes',
        input,
        cancellation: new SharedArrayBuffer(CANCELLATION_BUFFER_BYTES),
      },
      demoTasks,
      (event) => sent.push(event),
    )
    return sent
  }

  it('should apply the default checkpoint interval', async () => {
    await expect(run({ limit: 10 })).resolves.toEqual([
      {
        type: eventKeywords.taskComplete,
        taskId: 'primes-1',
        output: { count: 4, largest: 7 },
      },
    ])
  })

  it('should reject a limit below 2', async () => {
    const [event] = await run({ limit: 1 })

    expect(event?.type).toBe(eventKeywords.taskError)
    expect(event?.type === eventKeywords.taskError && event.error).toMatch(/^Invalid input: /)
  })
})
