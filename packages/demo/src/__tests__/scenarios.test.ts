import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest'
import {
  createCancellationToken,
  createDispatchLoop,
  createMainThreadQueue,
  createWorkContext,
  createWorkerPool,
  silentLogger,
} from '@offload/tasks'
import { createProgressView } from '../progressView'
import { createFolderBrowser, createSteppedWork, listFolders, steppedWork } from '../scenarios'

const quietLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() })

function startEngine() {
  const queue = createMainThreadQueue({ logger: silentLogger })
  const loop = createDispatchLoop({ queue })
  const pool = createWorkerPool({ queue, logger: silentLogger, name: 'demo-test' })
  loop.start()
  return { pool, stop: () => loop.stop() }
}

describe('steppedWork', () => {
  it('should report each step and finish with Done.', async () => {
    const progress = vi.fn()
    const ctx = createWorkContext(createCancellationToken(), progress)

    await expect(steppedWork({ steps: 4, stepMs: 0 })(ctx)).resolves.toBe('Done.')
    expect(progress.mock.calls).toEqual([
      [25, 'Step 1 of 4'],
      [50, 'Step 2 of 4'],
      [75, 'Step 3 of 4'],
      [100, 'Step 4 of 4'],
    ])
  })

  it('should truncate fractional percentages', async () => {
    const progress = vi.fn()
    const ctx = createWorkContext(createCancellationToken(), progress)

    await steppedWork({ steps: 3, stepMs: 0 })(ctx)

    expect(progress.mock.calls.map(([percent]) => percent)).toEqual([33, 66, 100])
  })
})

describe('createSteppedWork', () => {
  let engine = startEngine()

  afterEach(() => {
    engine.stop()
    engine = startEngine()
  })

  it('should drive the view to Done', async () => {
    const view = createProgressView(quietLogger())
    const work = createSteppedWork(engine.pool, view, silentLogger)

    const worker = work.start({ steps: 2, stepMs: 0 })
    expect(work.isRunning()).toBe(true)

    await worker?.whenSettled()
    expect(view.state.get()).toEqual({
      percent: 100,
      format: 'Done',
      label: 'Done.',
      working: false,
    })
    expect(work.isRunning()).toBe(false)
  })

  it('should refuse a second job while one is running', async () => {
    const logger = quietLogger()
    const work = createSteppedWork(engine.pool, createProgressView(quietLogger()), logger)

    const first = work.start({ steps: 2, stepMs: 0 })
    expect(work.start()).toBeNull()
    expect(logger.log).toHaveBeenCalledWith('[Work] Work is already running.')

    await first?.whenSettled()
  })

  it('should end cancelled when cancelled', async () => {
    const view = createProgressView(quietLogger())
    const work = createSteppedWork(engine.pool, view, silentLogger)

    const worker = work.start({ steps: 5, stepMs: 10 })
    expect(work.cancel()).toBe(true)
    expect(view.state.get().label).toBe('Cancel requested...')

    await expect(worker?.whenSettled()).resolves.toBe('cancelled')
    expect(view.state.get().format).toBe('Cancelled')
    expect(work.cancel()).toBe(false)
  })
})

describe('folders', () => {
  let root = ''

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'offload-demo-'))
    await mkdir(join(root, 'photos'))
    await mkdir(join(root, 'docs'))
    await mkdir(join(root, 'docs', 'taxes'))
    await writeFile(join(root, 'notes.txt'), 'test')
  })

  afterAll(async () => {
    await rm(root, { recursive: true, force: true })
  })

  describe('listFolders', () => {
    it('should list directories only, sorted', async () => {
      const ctx = createWorkContext(createCancellationToken(), vi.fn())

      await expect(listFolders(root)(ctx)).resolves.toEqual(['docs', 'photos'])
    })
  })

  describe('createFolderBrowser', () => {
    let engine = startEngine()

    afterEach(() => {
      engine.stop()
      engine = startEngine()
    })

    it('should record loaded children by path', async () => {
      const browser = createFolderBrowser(engine.pool, quietLogger())

      await browser.load(root).whenSettled()

      expect(browser.tree.get()).toEqual({
        [root]: [join(root, 'docs'), join(root, 'photos')],
      })
      expect(browser.isLoaded(root)).toBe(true)
    })

    it('should supersede a load still in flight', async () => {
      const logger = quietLogger()
      const browser = createFolderBrowser(engine.pool, logger)
      const docs = join(root, 'docs')

      const first = browser.load(root)
      const second = browser.load(docs)

      await expect(first.whenSettled()).resolves.toBe('cancelled')
      await expect(second.whenSettled()).resolves.toBe('done')

      expect(browser.tree.get()).toEqual({ [docs]: [join(docs, 'taxes')] })
      expect(logger.log).toHaveBeenCalledWith(`[Folders] Superseded ${root}`)
    })

    it('should log a failed load', async () => {
      const logger = quietLogger()
      const browser = createFolderBrowser(engine.pool, logger)

      await expect(browser.load(join(root, 'missing')).whenSettled()).resolves.toBe('errored')

      expect(logger.error).toHaveBeenCalledWith(
        expect.stringMatching(/^\[Folders\] Failed to load folder: ENOENT/),
      )
      expect(browser.isLoaded(join(root, 'missing'))).toBe(false)
    })
  })
})
