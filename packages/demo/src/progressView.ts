/**
 * Progress View
 *
 * Console stand-in for a progress bar, a label and a status line. All
 * updates arrive through worker callbacks, so they run on the main thread.
 */

import { createAtom } from '@offload/tasks'
import type { Logger } from '@offload/tasks'

export type ProgressViewState = {
  percent: number
  /** Bar caption: Idle, Working..., Done, Cancelled, Error */
  format: string
  label: string
  working: boolean
}

export const idleProgress: ProgressViewState = {
  percent: 0,
  format: 'Idle',
  label: '',
  working: false,
}

export function renderProgress({ percent, format, label }: ProgressViewState): string {
  const filled = Math.round(Math.min(Math.max(percent, 0), 100) / 10)
  const bar = `[${'#'.repeat(filled)}${'.'.repeat(10 - filled)}]`
  return label ? `${bar} ${percent}% ${format} ${label}` : `${bar} ${percent}% ${format}`
}

export function createProgressView(logger: Logger = console) {
  const state = createAtom<ProgressViewState>(idleProgress)

  state.subscribe((next) => {
    logger.log(renderProgress(next))
  })

  return {
    state,

    start: () => {
      state.set({
        percent: 0,
        format: 'Working...',
        label: 'Working in background...',
        working: true,
      })
    },

    progress: (percent: number, message: string) => {
      state.update((s) => ({ ...s, percent, label: message || s.label }))
    },

    cancelRequested: () => {
      state.update((s) => ({ ...s, label: 'Cancel requested...' }))
    },

    done: (result: string) => {
      state.set({ percent: 100, format: 'Done', label: result, working: false })
    },

    cancelled: () => {
      state.set({ percent: 0, format: 'Cancelled', label: 'Cancelled', working: false })
    },

    error: (message: string) => {
      state.set({ percent: 0, format: 'Error', label: 'Error', working: false })
      logger.error(`[Worker error] ${message}`)
    },
  }
}

export type ProgressView = ReturnType<typeof createProgressView>
