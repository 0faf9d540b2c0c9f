/**
 * Demo scenarios
 *
 * - Stepped work: a fixed number of sleeps with progress, one at a time
 * - Folder browser: directory listings, each load replacing the previous one
 * - Prime count: CPU-bound work on a worker thread
 */

import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import {
  createAtom,
  createOperationSlot,
  createWorkRequest,
} from '@offload/tasks'
import type {
  Logger,
  TaskBody,
  ThreadRunner,
  Worker,
  WorkerPool,
} from '@offload/tasks'
import type { ProgressView } from './progressView'
import type { DemoTasks } from './tasks'

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

// ============================================================================
// Stepped work
// ============================================================================

export type SteppedWorkOptions = {
  steps?: number
  stepMs?: number
}

export function steppedWork({ steps = 10, stepMs = 250 }: SteppedWorkOptions = {}): TaskBody<string> {
  return async (ctx) => {
    for (let step = 1; step <= steps; step++) {
      ctx.checkCancelled()
      await sleep(stepMs)
      ctx.progress(Math.trunc((step / steps) * 100), `Step ${step} of ${steps}`)
    }
    return 'Done.'
  }
}

/**
 * One stepped job at a time, reported through a progress view
 */
export function createSteppedWork(
  pool: Pick<WorkerPool, 'submit'>,
  view: ProgressView,
  logger: Logger = console,
) {
  let active: Worker<string> | null = null

  const finish = () => {
    active = null
  }

  return {
    /** Returns null when a job is already running */
    start: (options?: SteppedWorkOptions): Worker<string> | null => {
      if (active) {
        logger.log('[Work] Work is already running.')
        return null
      }

      view.start()
      active = pool.submit(
        createWorkRequest({
          label: 'stepped-work',
          run: steppedWork(options),
          onProgress: view.progress,
          onDone: (result) => {
            view.done(result)
            finish()
          },
          onCancel: () => {
            view.cancelled()
            finish()
          },
          onError: (message) => {
            view.error(message)
            finish()
          },
        }),
      )
      return active
    },

    cancel: () => {
      if (!active) return false
      active.cancel()
      view.cancelRequested()
      return true
    },

    isRunning: () => active !== null,
  }
}

// ============================================================================
// Folder browser
// ============================================================================

/**
 * Names of the directories directly under `path`, sorted
 */
export function listFolders(path: string): TaskBody<Array<string>> {
  return async (ctx) => {
    ctx.checkCancelled()
    const entries = await readdir(path, { withFileTypes: true })
    ctx.checkCancelled()
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
  }
}

export type FolderTree = Record<string, Array<string>>

/**
 * Lazily loaded folder tree. Loading a folder cancels whatever load is still
 * in flight, the way expanding another node would.
 */
export function createFolderBrowser(
  pool: Pick<WorkerPool, 'submit'>,
  logger: Logger = console,
) {
  const slot = createOperationSlot(pool, 'folder-tree')
  const tree = createAtom<FolderTree>({})

  const load = (path: string): Worker<Array<string>> => {
    logger.log(`[Folders] Loading ${path}...`)

    return slot.replace(
      createWorkRequest({
        run: listFolders(path),
        onDone: (folders) => {
          tree.update((current) => ({
            ...current,
            [path]: folders.map((name) => join(path, name)),
          }))
          logger.log(`[Folders] Loaded ${path} (${folders.length} folders)`)
        },
        onCancel: () => {
          logger.log(`[Folders] Superseded ${path}`)
        },
        onError: (message) => {
          logger.error(`[Folders] Failed to load folder: ${message}`)
        },
      }),
    )
  }

  return {
    load,
    tree,
    slot,
    isLoaded: (path: string) => path in tree.get(),
  }
}

// ============================================================================
// Prime count
// ============================================================================

export function countPrimesOnThread(
  pool: Pick<WorkerPool, 'submit'>,
  runner: ThreadRunner<DemoTasks>,
  view: ProgressView,
  limit: number,
): Worker<{ count: number; largest: number | null }> {
  view.start()
  return pool.submit(
    runner.request(
      'countPrimes',
      { limit },
      {
        onProgress: view.progress,
        onDone: ({ count, largest }) => {
          view.done(
            largest === null ? 'No primes found.' : `${count} primes, largest ${largest}.`,
          )
        },
        onCancel: view.cancelled,
        onError: view.error,
      },
    ),
  )
}
