/**
 * Demo entry point
 *
 * Starts the engine system, runs one scenario to its end and halts.
 * `--cancel-after` plays the part of a cancel button.
 */

import { haltSystem, startSystem } from 'braided'
import {
  createEngineSystem,
  createNodeThreadSpawner,
  createThreadRunner,
} from '@offload/tasks'
import type { Worker, WorkerPool } from '@offload/tasks'
import { parseCommand } from './cli'
import type { DemoCommand } from './cli'
import { createProgressView } from './progressView'
import { countPrimesOnThread, createFolderBrowser, createSteppedWork } from './scenarios'
import { demoTasks } from './tasks'

function cancelLater(worker: Worker<unknown>, ms: number | undefined, cancel: () => void) {
  if (ms === undefined) return
  const timer = setTimeout(cancel, ms)
  void worker.whenSettled().then(() => clearTimeout(timer))
}

async function runCommand(command: DemoCommand, pool: WorkerPool): Promise<void> {
  switch (command.command) {
    case 'work': {
      const view = createProgressView()
      const work = createSteppedWork(pool, view)
      const worker = work.start({ steps: command.steps, stepMs: command.stepMs })
      if (!worker) return
      cancelLater(worker, command.cancelAfter, () => {
        work.cancel()
      })
      await worker.whenSettled()
      return
    }

    case 'list': {
      const browser = createFolderBrowser(pool)
      // Every load but the last is superseded by the next one
      const workers = command.paths.map((path) => browser.load(path))
      await Promise.all(workers.map((worker) => worker.whenSettled()))
      Object.entries(browser.tree.get()).forEach(([path, folders]) => {
        console.log(path)
        folders.forEach((folder) => console.log(`  ${folder}`))
      })
      return
    }

    case 'primes': {
      const runner = createThreadRunner({
        tasks: demoTasks,
        spawn: createNodeThreadSpawner({
          script: new URL('./thread.ts', import.meta.url),
          execArgv: ['--import', 'tsx'],
        }),
      })
      const view = createProgressView()
      const worker = countPrimesOnThread(pool, runner, view, command.limit)
      cancelLater(worker, command.cancelAfter, () => {
        if (worker.cancel()) view.cancelRequested()
      })
      await worker.whenSettled()
      return
    }
  }
}

async function main(argv: Array<string>): Promise<void> {
  const command = parseCommand(argv)
  const config = createEngineSystem({ pool: { name: 'demo' } })

  const { system, errors } = await startSystem(config)
  if (errors.size > 0) {
    errors.forEach((error, resourceId) => {
      console.error(`[Demo] ${resourceId} failed to start:`, error)
    })
    throw new Error('Engine failed to start')
  }

  try {
    await runCommand(command, system.workerPool)
  } finally {
    await haltSystem(config, system)
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error('[Demo]', error)
  process.exitCode = 1
})
