/**
 * Application Lifecycle
 *
 * notStarted → running → exited, once each.
 *
 * The runtime stays up while any resource is tracked or any window is open.
 * Losing a resource or a window schedules a quiescence check after
 * `quiescenceDelayMs`; the check reads the tracker and window set when it
 * runs, not when it was scheduled, so a handler that stops one timer and
 * starts another never causes an exit in between.
 *
 * Halting (the resource's halt, or a forced shutdown) closes every open
 * window and counts as an exit.
 *
 * Philosophy:
 * - Only losses schedule checks
 * - Repeated schedules collapse into one check (debounced)
 * - The check never throws and exits at most once
 */

import { Debouncer } from '@tanstack/pacer'
import { defineResource } from 'braided'
import type { StartedResource } from 'braided'
import { createAtom, createSubscription } from '@sketchloop/system'
import type { Logger } from '@sketchloop/system'
import type { ResourceTracker } from './tracker'
import { runtimeKeywords } from './vocabulary'
import type { LifecycleState } from './vocabulary'

/**
 * A top-level window, closed by the lifecycle when it halts
 */
export type LifecycleWindow = {
  close: () => void
}

export type LifecycleOptions = {
  tracker: ResourceTracker
  quiescenceDelayMs: number
  log: Logger
}

// Long enough to never fire; only there to hold the host loop open
const KEEP_ALIVE_MS = 2 ** 30

export function createLifecycle({ tracker, quiescenceDelayMs, log }: LifecycleOptions) {
  const state = createAtom<LifecycleState>(runtimeKeywords.lifecycleStates.notStarted)
  const windows = new Set<LifecycleWindow>()
  const exit$ = createSubscription<void>()

  let keepAlive: ReturnType<typeof setInterval> | null = null
  let resolveExit: () => void = () => {}
  const exited = new Promise<void>((resolve) => {
    resolveExit = resolve
  })

  const exit = (reason: string) => {
    state.set(runtimeKeywords.lifecycleStates.exited)
    debouncer.cancel()
    if (keepAlive !== null) {
      clearInterval(keepAlive)
      keepAlive = null
    }
    log.info(`Exited: ${reason}`)
    exit$.notify()
    resolveExit()
  }

  /**
   * Exit iff running with nothing tracked and no window open.
   * Returns whether this call exited.
   */
  const checkQuiescence = (): boolean => {
    if (state.get() !== runtimeKeywords.lifecycleStates.running) return false
    if (tracker.size() > 0 || windows.size > 0) return false

    exit('no resources or windows remain')
    return true
  }

  const debouncer = new Debouncer(checkQuiescence, { wait: quiescenceDelayMs })

  const scheduleQuiescenceCheck = () => {
    if (state.get() === runtimeKeywords.lifecycleStates.exited) return
    debouncer.maybeExecute()
  }

  const unsubscribeReleased = tracker.released$.subscribe(scheduleQuiescenceCheck)

  return {
    state,
    exit$,

    getState: () => state.get(),

    /**
     * notStarted → running. Later calls do nothing.
     * Schedules a check so a setup that created nothing still exits.
     */
    start: () => {
      if (state.get() !== runtimeKeywords.lifecycleStates.notStarted) return
      state.set(runtimeKeywords.lifecycleStates.running)
      keepAlive = setInterval(() => {}, KEEP_ALIVE_MS)
      log.info('Running')
      scheduleQuiescenceCheck()
    },

    openWindow: (window: LifecycleWindow) => {
      windows.add(window)
    },

    closeWindow: (window: LifecycleWindow) => {
      windows.delete(window)
      scheduleQuiescenceCheck()
    },

    openWindowCount: () => windows.size,

    scheduleQuiescenceCheck,
    checkQuiescence,

    /**
     * Resolves when the runtime exits
     */
    whenExited: () => exited,

    /**
     * Close every open window and exit, whatever the state
     */
    halt: () => {
      unsubscribeReleased()
      if (state.get() !== runtimeKeywords.lifecycleStates.exited) exit('halted')
      Array.from(windows).forEach((window) => window.close())
      windows.clear()
    },
  }
}

export type Lifecycle = ReturnType<typeof createLifecycle>

// ============================================================================
// Resource Definition
// ============================================================================

export const createLifecycleResource = (options: Omit<LifecycleOptions, 'tracker'>) =>
  defineResource({
    dependencies: ['tracker'],
    start: ({ tracker }: { tracker: ResourceTracker }) => createLifecycle({ ...options, tracker }),
    halt: (lifecycle) => {
      lifecycle.halt()
    },
  })

export type LifecycleResource = StartedResource<ReturnType<typeof createLifecycleResource>>
