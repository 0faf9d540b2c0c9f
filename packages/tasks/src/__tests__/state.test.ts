import { describe, expect, it, vi } from 'vitest'
import { createAtom, createListeners } from '@offload/tasks'

describe('createListeners', () => {
  it('should notify every listener until it is removed', () => {
    const listeners = createListeners<number>()
    const first = vi.fn()
    const second = vi.fn()

    const remove = listeners.add(first)
    listeners.add(second)
    listeners.notify(1)
    remove()
    listeners.notify(2)

    expect(first.mock.calls).toEqual([[1]])
    expect(second.mock.calls).toEqual([[1], [2]])
  })

  it('should let a listener remove itself while being notified', () => {
    const listeners = createListeners<string>()
    const after = vi.fn()

    let remove: () => void = () => {}
    remove = listeners.add(() => remove())
    listeners.add(after)
    listeners.notify('a')
    listeners.notify('b')

    expect(after.mock.calls).toEqual([['a'], ['b']])
  })
})

describe('createAtom', () => {
  it('should update the value and notify subscribers', () => {
    const atom = createAtom({ count: 0 })
    const seen: Array<number> = []
    atom.subscribe((state) => seen.push(state.count))

    atom.update((state) => ({ count: state.count + 1 }))
    atom.set({ count: 10 })

    expect(atom.get()).toEqual({ count: 10 })
    expect(seen).toEqual([1, 10])
  })

  it('should stay silent when set to the current value', () => {
    const atom = createAtom('running')
    const listener = vi.fn()
    atom.subscribe(listener)

    atom.set('running')
    atom.set('done')
    atom.set('done')

    expect(listener.mock.calls).toEqual([['done']])
  })
})
