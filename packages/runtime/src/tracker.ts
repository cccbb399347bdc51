/**
 * Resource Tracker
 *
 * The set of live timers and sounds. Set semantics: tracking twice is one
 * entry, untracking an absent resource is a no-op for the set.
 *
 * Every untrack is announced on `released$`, which the lifecycle turns into
 * a deferred exit check. Tracking announces nothing: gaining a resource can
 * never cause an exit.
 *
 * Each entry carries a `release` callback. Halting the tracker calls them
 * all, so a forced shutdown silences whatever is still live.
 */

import { defineResource } from 'braided'
import type { StartedResource } from 'braided'
import { createSubscription } from '@sketchloop/system'
import type { ResourceKind } from './vocabulary'

export type TrackedResource = {
  resource: object
  kind: ResourceKind
}

type Entry = {
  kind: ResourceKind
  release: () => void
}

export function createResourceTracker() {
  const resources = new Map<object, Entry>()
  const released$ = createSubscription<TrackedResource | null>()

  return {
    /**
     * Track a resource. `release` stops it if the runtime halts first.
     */
    track: (resource: object, kind: ResourceKind, release: () => void) => {
      resources.set(resource, { kind, release })
    },

    /**
     * Remove a resource. Returns whether it was tracked.
     * Subscribers hear about every call, with null for an absent resource.
     */
    untrack: (resource: object) => {
      const entry = resources.get(resource)
      const removed = resources.delete(resource)
      released$.notify(entry === undefined ? null : { resource, kind: entry.kind })
      return removed
    },

    has: (resource: object) => resources.has(resource),

    size: () => resources.size,

    snapshot: (): Array<TrackedResource> =>
      Array.from(resources, ([resource, { kind }]) => ({ resource, kind })),

    /**
     * Release everything still tracked and empty the set, announcing nothing
     */
    releaseAll: () => {
      const entries = Array.from(resources.values())
      resources.clear()
      released$.clear()
      entries.forEach(({ release }) => release())
    },

    released$,
  }
}

export type ResourceTracker = ReturnType<typeof createResourceTracker>

// ============================================================================
// Resource Definition
// ============================================================================

export const trackerResource = defineResource({
  dependencies: [],
  start: () => createResourceTracker(),
  halt: (tracker) => {
    tracker.releaseAll()
  },
})

export type TrackerResource = StartedResource<typeof trackerResource>
