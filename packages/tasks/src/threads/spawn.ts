import { Worker as NodeThread } from 'node:worker_threads'
import { z } from 'zod'
import type { Logger } from '../logger'
import type { SpawnThread } from './client'

export const threadSpawnerConfigSchema = z.object({
  /** Entry script calling `serveTasks` */
  script: z.union([z.string().min(1), z.instanceof(URL)]),
  /** e.g. ['--import', 'tsx'] to run a TypeScript entry */
  execArgv: z.array(z.string()).default([]),
  maxOldGenerationSizeMb: z.number().positive().optional(),
})

export type ThreadSpawnerConfig = z.input<typeof threadSpawnerConfigSchema>

/**
 * Spawn worker_threads threads running the given entry script
 */
export function createNodeThreadSpawner(
  config: ThreadSpawnerConfig,
  logger: Logger = console,
): SpawnThread {
  const { script, execArgv, maxOldGenerationSizeMb } =
    threadSpawnerConfigSchema.parse(config)

  return () => {
    const thread = new NodeThread(script, {
      execArgv,
      resourceLimits:
        maxOldGenerationSizeMb === undefined ? undefined : { maxOldGenerationSizeMb },
    })

    return {
      send: (event) => thread.postMessage(event),
      onMessage: (listener) => {
        thread.on('message', listener)
      },
      onError: (listener) => {
        thread.on('error', listener)
      },
      onExit: (listener) => {
        thread.on('exit', listener)
      },
      terminate: () => {
        thread.terminate().catch((error: unknown) => {
          logger.warn('[ThreadSpawner] Failed to terminate thread:', error)
        })
      },
    }
  }
}
