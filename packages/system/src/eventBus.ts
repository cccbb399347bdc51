/**
 * Type-Safe Event Bus
 *
 * A lightweight event bus keyed by an event map.
 * Each key names an event kind, its value type is the payload.
 *
 * Philosophy:
 * - Payload types flow from the map, no descriptors needed
 * - Callbacks run synchronously, in subscription order
 * - Errors propagate to the emitter; later subscribers are skipped
 */

// ============================================================================
// Types
// ============================================================================

export type EventCallback<TPayload> = (payload: TPayload) => void

export type Unsubscribe = () => void

export type EventMap = Record<string, unknown>

export interface EventBus<TEvents extends EventMap> {
  /**
   * Subscribe to one event kind.
   * Returns an unsubscribe function.
   */
  on: <K extends keyof TEvents & string>(
    type: K,
    callback: EventCallback<TEvents[K]>,
  ) => Unsubscribe

  /**
   * Emit a payload to every subscriber of `type`.
   */
  emit: <K extends keyof TEvents & string>(type: K, payload: TEvents[K]) => void

  /**
   * Remove every subscription.
   */
  clear: () => void

  /**
   * Number of active subscriptions across all kinds.
   */
  size: () => number
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

/**
 * Create a new event bus instance.
 *
 * @example
 * ```ts
 * const bus = createEventBus<{ keydown: number }>()
 * const unsub = bus.on('keydown', (code) => console.log(code))
 * bus.emit('keydown', 32)
 * unsub()
 * ```
 */
export function createEventBus<TEvents extends EventMap>(): EventBus<TEvents> {
  const subscriptions: {
    [K in keyof TEvents]?: Set<EventCallback<TEvents[K]>>
  } = {}

  // Every callback set ever created, for clear() and size()
  const registry = new Set<Set<unknown>>()

  return {
    on(type, callback) {
      let callbacks: Set<EventCallback<TEvents[typeof type]>> | undefined =
        subscriptions[type]
      if (!callbacks) {
        callbacks = new Set<EventCallback<TEvents[typeof type]>>()
        subscriptions[type] = callbacks
        registry.add(callbacks)
      }
      callbacks.add(callback)

      const owner = callbacks
      return () => {
        owner.delete(callback)
      }
    },

    emit(type, payload) {
      const callbacks = subscriptions[type]
      if (!callbacks) return

      // Snapshot so a callback that resubscribes doesn't see itself twice
      for (const callback of [...callbacks]) {
        callback(payload)
      }
    },

    clear() {
      registry.forEach((callbacks) => callbacks.clear())
    },

    size() {
      let count = 0
      registry.forEach((callbacks) => {
        count += callbacks.size
      })
      return count
    },
  }
}
