/**
 * State primitives
 *
 * Subscriptions and atoms for state that lives on the event loop thread.
 * Nothing here is reactive beyond "call every subscriber, in order, now".
 */

/**
 * Create a subscription channel
 * Subscribers are called synchronously in registration order
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<(payload: TPayload) => void>()

  return {
    subscribe: (callback: (payload: TPayload) => void): (() => void) => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    notify: (payload: TPayload) => {
      subscribers.forEach((callback) => callback(payload))
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => subscribers.size,
  }
}

export type Subscription<TPayload> = ReturnType<
  typeof createSubscription<TPayload>
>

/**
 * Create a state atom
 * `update` and `set` notify subscribers with the new state
 */
export function createAtom<T>(initialState: T) {
  let state = initialState
  const changes = createSubscription<T>()

  return {
    get: () => state,
    set: (next: T) => {
      state = next
      changes.notify(state)
    },
    update: (updater: (current: T) => T) => {
      state = updater(state)
      changes.notify(state)
    },
    subscribe: changes.subscribe,
  }
}

export type Atom<T> = ReturnType<typeof createAtom<T>>
