/**
 * Timers
 *
 * A running timer is tracked; a stopped one is not. Restarting from inside
 * the handler is fine: stop schedules the exit check, start re-tracks before
 * it runs.
 */

import { createIntervalLoop, validate } from '@sketchloop/system'
import { z } from 'zod'
import type { RuntimeContext } from './context'
import { runtimeKeywords } from './vocabulary'

export type Timer = {
  /**
   * Start, or restart with a fresh interval
   */
  start: () => void
  stop: () => void
  isRunning: () => boolean
}

const intervalSchema = z.number().finite().positive()

export function createTimer(
  context: RuntimeContext,
  intervalMs: number,
  handler: () => void,
): Timer {
  const loop = createIntervalLoop({
    intervalMs: validate(intervalSchema, intervalMs, 'timer interval'),
    tick: () => handler(),
  })

  const timer: Timer = {
    start: () => {
      loop.restart()
      context.tracker.track(timer, runtimeKeywords.resourceKinds.timer, loop.stop)
    },
    stop: () => {
      loop.stop()
      context.tracker.untrack(timer)
    },
    isRunning: () => loop.isRunning(),
  }

  return timer
}
