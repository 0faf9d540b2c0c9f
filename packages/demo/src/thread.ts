/**
 * Thread entry point
 * Spawned by the runner in main.ts, one thread per countPrimes execution.
 */

import { serveTasks } from '@offload/tasks'
import { demoTasks } from './tasks'

serveTasks(demoTasks).catch((error: unknown) => {
  console.error('[Thread] Failed to start:', error)
  process.exitCode = 1
})
