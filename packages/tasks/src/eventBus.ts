/**
 * Type-Safe Event Bus
 *
 * Lifecycle notifications for observers that are not the submitter of a
 * piece of work: status bars, activity indicators, logging.
 * Events are emitted from the main thread only.
 */

// ============================================================================
// Types
// ============================================================================

export type EventCallback<TEvent = unknown> = (event: TEvent) => void

export type Unsubscribe = () => void

/**
 * Event descriptor for type-safe subscriptions.
 * Carries the event type string and a phantom type for inference.
 */
export interface EventDescriptor<TEvent = unknown> {
  readonly type: string
  /** Phantom type for inference - not present at runtime */
  readonly _event?: TEvent
}

export interface EventBusOptions {
  /**
   * Handler for subscriber errors.
   * If not provided, errors are thrown.
   */
  onError?: (error: unknown, eventType: string) => void
}

export interface EventBus {
  /** Subscribe to one event kind. Returns an unsubscribe function. */
  subscribe: <TEvent>(
    descriptor: EventDescriptor<TEvent>,
    callback: EventCallback<TEvent>,
  ) => Unsubscribe

  /** Subscribe to every event, receiving the type alongside the payload */
  onAny: (callback: (eventType: string, event: unknown) => void) => Unsubscribe

  emit: <TEvent>(descriptor: EventDescriptor<TEvent>, event: TEvent) => void

  clear: () => void

  /** Number of active subscriptions */
  size: () => number
}

/**
 * Declare an event kind
 *
 * @example
 * ```ts
 * const saved = defineEvent<{ path: string }>('document:saved')
 * bus.subscribe(saved, (event) => console.log(event.path))
 * bus.emit(saved, { path: '/tmp/a.txt' })
 * ```
 */
export function defineEvent<TEvent>(type: string): EventDescriptor<TEvent> {
  return { type }
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

export function createEventBus(options: EventBusOptions = {}): EventBus {
  // Subscribers are stored type-erased; `subscribe` and `emit` are the only
  // ways in and both go through the same descriptor, so payloads match.
  const subscriptions = new Map<string, Set<EventCallback<never>>>()
  const anySubscriptions = new Set<(eventType: string, event: unknown) => void>()

  const handleError =
    options.onError ??
    ((error: unknown) => {
      throw error
    })

  const invoke = (eventType: string, run: () => void) => {
    try {
      run()
    } catch (error) {
      handleError(error, eventType)
    }
  }

  return {
    subscribe<TEvent>(
      descriptor: EventDescriptor<TEvent>,
      callback: EventCallback<TEvent>,
    ): Unsubscribe {
      let callbacks = subscriptions.get(descriptor.type)
      if (!callbacks) {
        callbacks = new Set()
        subscriptions.set(descriptor.type, callbacks)
      }
      callbacks.add(callback)

      return () => {
        const current = subscriptions.get(descriptor.type)
        if (!current) return
        current.delete(callback)
        if (current.size === 0) {
          subscriptions.delete(descriptor.type)
        }
      }
    },

    onAny(callback) {
      anySubscriptions.add(callback)
      return () => {
        anySubscriptions.delete(callback)
      }
    },

    emit<TEvent>(descriptor: EventDescriptor<TEvent>, event: TEvent): void {
      const callbacks = subscriptions.get(descriptor.type)
      if (callbacks) {
        for (const callback of Array.from(callbacks)) {
          invoke(descriptor.type, () => (callback as EventCallback<TEvent>)(event))
        }
      }

      for (const callback of Array.from(anySubscriptions)) {
        invoke(descriptor.type, () => callback(descriptor.type, event))
      }
    },

    clear(): void {
      subscriptions.clear()
      anySubscriptions.clear()
    },

    size(): number {
      let count = anySubscriptions.size
      subscriptions.forEach((callbacks) => {
        count += callbacks.size
      })
      return count
    },
  }
}
