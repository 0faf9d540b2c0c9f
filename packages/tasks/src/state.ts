/**
 * Observable values
 *
 * Worker status and pool stats are read synchronously and watched by
 * whoever renders them. Listeners run in subscription order, on the thread
 * that made the change.
 */

export type Listener<T> = (value: T) => void

export type Listeners<T> = {
  add: (listener: Listener<T>) => () => void
  notify: (value: T) => void
}

export function createListeners<T>(): Listeners<T> {
  const listeners = new Set<Listener<T>>()

  return {
    add: (listener) => {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
    notify: (value) => {
      // Snapshot: a listener may unsubscribe itself
      for (const listener of Array.from(listeners)) {
        listener(value)
      }
    },
  }
}

export type Atom<T> = {
  get: () => T
  /** Listeners hear about changes only; setting the current value is silent */
  set: (next: T) => void
  update: (updater: (current: T) => T) => void
  subscribe: (listener: Listener<T>) => () => void
}

export function createAtom<T>(initial: T): Atom<T> {
  let value = initial
  const listeners = createListeners<T>()

  const set = (next: T) => {
    if (Object.is(value, next)) return
    value = next
    listeners.notify(next)
  }

  return {
    get: () => value,
    set,
    update: (updater) => set(updater(value)),
    subscribe: listeners.add,
  }
}
