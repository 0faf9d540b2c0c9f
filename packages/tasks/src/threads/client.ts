/**
 * Thread Tasks - Client Side
 *
 * Turns a registered thread task into an ordinary task body, so thread work
 * goes through the same WorkerPool, callbacks and cancellation as anything
 * else.
 *
 * One thread per execution:
 *   spawn → worker/ready → task/request → task/progress* → terminal → terminate
 *
 * The request carries the context's cancellation buffer; `worker.cancel()` on
 * the main side flips the flag the thread's checkpoints read.
 */

import { CancelledError } from '../cancellation'
import type { WorkContext } from '../context'
import { generateId } from '../ids'
import type { Logger } from '../logger'
import type { TaskBody, WorkRequest } from '../request'
import type {
  ClientEvent,
  InferInput,
  InferOutput,
  TaskName,
  TaskRegistry,
} from './core'
import { eventKeywords, workerEventSchema } from './core'

/**
 * A spawned thread, reduced to what the runner needs
 */
export type ThreadHandle = {
  send: (event: ClientEvent) => void
  onMessage: (listener: (data: unknown) => void) => void
  onError: (listener: (error: Error) => void) => void
  onExit: (listener: (code: number) => void) => void
  terminate: () => void
}

export type SpawnThread = () => ThreadHandle

export type ThreadRunnerOptions<TTasks extends TaskRegistry> = {
  tasks: TTasks
  spawn: SpawnThread
  logger?: Logger
}

export type ThreadRunner<TTasks extends TaskRegistry> = {
  /** Task body running `taskName` on a fresh thread */
  run: <TName extends TaskName<TTasks>>(
    taskName: TName,
    input: InferInput<TTasks[TName]>,
  ) => TaskBody<InferOutput<TTasks[TName]>>

  /** Work request for `taskName`, ready for `pool.submit` */
  request: <TName extends TaskName<TTasks>>(
    taskName: TName,
    input: InferInput<TTasks[TName]>,
    callbacks?: Omit<WorkRequest<InferOutput<TTasks[TName]>>, 'run'>,
  ) => WorkRequest<InferOutput<TTasks[TName]>>
}

/**
 * Create a runner for a task registry
 *
 * @example
 * ```ts
 * const runner = createThreadRunner({
 *   tasks,
 *   spawn: createNodeThreadSpawner({ script: new URL('./thread.ts', import.meta.url) }),
 * })
 *
 * pool.submit(runner.request('countPrimes', { limit: 5_000_000 }, {
 *   onProgress: (percent) => bar.update(percent),
 *   onDone: (result) => console.log(result.count),
 * }))
 * ```
 */
export function createThreadRunner<TTasks extends TaskRegistry>(
  options: ThreadRunnerOptions<TTasks>,
): ThreadRunner<TTasks> {
  const { tasks, spawn, logger = console } = options

  const run = <TName extends TaskName<TTasks>>(
    taskName: TName,
    input: InferInput<TTasks[TName]>,
  ): TaskBody<InferOutput<TTasks[TName]>> => {
    return (ctx: WorkContext) =>
      new Promise<InferOutput<TTasks[TName]>>((resolve, reject) => {
        if (!(taskName in tasks)) {
          reject(new Error(`Unknown task: ${taskName}`))
          return
        }
        const task = tasks[taskName]

        // No thread for work cancelled before it started
        ctx.checkCancelled()

        const taskId = generateId()
        const thread = spawn()
        let finished = false

        const finish = (settle: () => void) => {
          if (finished) return
          finished = true
          thread.terminate()
          settle()
        }

        thread.onMessage((data) => {
          const parsed = workerEventSchema.safeParse(data)
          if (!parsed.success) {
            logger.warn(`[ThreadRunner] Ignoring malformed message for ${taskName}`)
            return
          }
          const event = parsed.data

          switch (event.type) {
            case eventKeywords.workerReady:
              thread.send({
                type: eventKeywords.taskRequest,
                taskId,
                taskName,
                input,
                cancellation: ctx.cancellation,
              })
              return
            case eventKeywords.taskProgress:
              if (event.taskId === taskId) {
                ctx.progress(event.percent, event.message)
              }
              return
            case eventKeywords.taskComplete:
              finish(() => {
                const outputSchema: TTasks[TName]['output'] = task.output
                const output = outputSchema.safeParse(event.output)
                if (output.success) {
                  resolve(output.data)
                } else {
                  reject(new Error(`Invalid output: ${output.error.message}`))
                }
              })
              return
            case eventKeywords.taskError:
              finish(() => reject(new Error(event.error)))
              return
            case eventKeywords.taskCancelled:
              finish(() => reject(new CancelledError()))
              return
          }
        })

        thread.onError((error) => {
          logger.error(`[ThreadRunner] Thread failed running ${taskName}:`, error)
          finish(() => reject(error))
        })

        thread.onExit((code) => {
          finish(() =>
            reject(
              new Error(`Thread exited with code ${code} before ${taskName} finished`),
            ),
          )
        })
      })
  }

  return {
    run,
    request: <TName extends TaskName<TTasks>>(
      taskName: TName,
      input: InferInput<TTasks[TName]>,
      callbacks: Omit<WorkRequest<InferOutput<TTasks[TName]>>, 'run'> = {},
    ): WorkRequest<InferOutput<TTasks[TName]>> => ({
      label: taskName,
      ...callbacks,
      run: run(taskName, input),
    }),
  }
}
