/**
 * Interval Loop
 *
 * Fixed-cadence tick driver on top of the host event loop's interval timer.
 * Used for render ticks and user timers alike.
 *
 * Philosophy:
 * - One tick per interval, never re-entrant
 * - A slow tick delays the next one, nothing is dropped or caught up
 * - Errors reach the host loop
 */

export type IntervalLoopOptions = {
  /**
   * Milliseconds between ticks
   */
  intervalMs: number

  /**
   * Called once per interval while running
   */
  tick: () => void
}

export type IntervalLoopAPI = {
  /**
   * Start ticking
   * Safe to call multiple times (idempotent)
   */
  start: () => void

  /**
   * Stop ticking
   * A tick already in flight is not affected
   */
  stop: () => void

  /**
   * Stop, then start again with a fresh interval
   */
  restart: () => void

  isRunning: () => boolean
}

/**
 * Create an interval loop
 *
 * @example
 * ```typescript
 * const loop = createIntervalLoop({
 *   intervalMs: 17,
 *   tick: () => surface.tick(),
 * })
 *
 * loop.start()
 * ```
 */
export function createIntervalLoop(
  options: IntervalLoopOptions,
): IntervalLoopAPI {
  const { intervalMs, tick } = options

  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`[IntervalLoop] intervalMs must be positive, got ${intervalMs}`)
  }

  let intervalId: ReturnType<typeof setInterval> | null = null

  const run = () => {
    if (intervalId === null) return
    tick()
  }

  const start = () => {
    if (intervalId !== null) return
    intervalId = setInterval(run, intervalMs)
  }

  const stop = () => {
    if (intervalId === null) return
    clearInterval(intervalId)
    intervalId = null
  }

  return {
    start,
    stop,
    restart: () => {
      stop()
      start()
    },
    isRunning: () => intervalId !== null,
  }
}
