/**
 * Thread tasks for the demo
 *
 * Imported by both sides: main.ts picks tasks by name, thread.ts serves them.
 * Bodies here block their thread, so they only ever run through the thread
 * runner.
 */

import { z } from 'zod'
import { defineTask } from '@offload/tasks'
import type { WorkContext } from '@offload/tasks'

/**
 * Trial division, checking for cancellation every `checkEvery` candidates
 * and reporting progress whenever the whole percentage changes.
 */
export function countPrimes(
  limit: number,
  checkEvery: number,
  ctx: WorkContext,
): { count: number; largest: number | null } {
  let count = 0
  let largest: number | null = null
  let reported = -1

  for (let n = 2; n <= limit; n++) {
    if (n % checkEvery === 0) {
      ctx.checkCancelled()
      const percent = Math.trunc((n * 100) / limit)
      if (percent !== reported) {
        reported = percent
        ctx.progress(percent, `Checked ${n} of ${limit}`)
      }
    }

    let prime = true
    for (let d = 2; d * d <= n; d++) {
      if (n % d === 0) {
        prime = false
        break
      }
    }
    if (prime) {
      count += 1
      largest = n
    }
  }

  return { count, largest }
}

export const demoTasks = {
  countPrimes: defineTask({
    input: z.object({
      limit: z.number().int().min(2),
      checkEvery: z.number().int().positive().default(10_000),
    }),
    output: z.object({
      count: z.number().int(),
      largest: z.number().int().nullable(),
    }),
    execute: ({ limit, checkEvery }, ctx) => countPrimes(limit, checkEvery, ctx),
    parseIO: true,
  }),
}

export type DemoTasks = typeof demoTasks
