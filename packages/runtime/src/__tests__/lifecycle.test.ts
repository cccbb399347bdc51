/**
 * Application Lifecycle Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from '@sketchloop/system'
import { createLifecycle, createResourceTracker, createRuntime } from '@sketchloop/runtime'
import type { Timer } from '@sketchloop/runtime'

const createTestLifecycle = () => {
  const tracker = createResourceTracker()
  const lifecycle = createLifecycle({
    tracker,
    quiescenceDelayMs: 10,
    log: createLogger('Lifecycle', 'silent'),
  })
  return { tracker, lifecycle }
}

describe('createLifecycle', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should start in notStarted and move to running once', () => {
    const { lifecycle } = createTestLifecycle()
    const states: Array<string> = []
    lifecycle.state.subscribe((state) => states.push(state))

    expect(lifecycle.getState()).toBe('notStarted')
    lifecycle.start()
    lifecycle.start()

    expect(states).toEqual(['running'])
  })

  it('should exit after the quiescence delay when nothing was created', async () => {
    const { lifecycle } = createTestLifecycle()
    const onExit = vi.fn()
    lifecycle.exit$.subscribe(onExit)

    lifecycle.start()
    vi.advanceTimersByTime(9)
    expect(lifecycle.getState()).toBe('running')

    vi.advanceTimersByTime(1)
    expect(lifecycle.getState()).toBe('exited')
    expect(onExit).toHaveBeenCalledTimes(1)
    await expect(lifecycle.whenExited()).resolves.toBeUndefined()
  })

  it('should not exit before start', () => {
    const { tracker, lifecycle } = createTestLifecycle()
    const resource = {}

    tracker.track(resource, 'sound', () => {})
    tracker.untrack(resource)
    vi.advanceTimersByTime(100)

    expect(lifecycle.getState()).toBe('notStarted')
  })

  it('should stay up while a resource is tracked', () => {
    const { tracker, lifecycle } = createTestLifecycle()
    const timer = {}

    tracker.track(timer, 'timer', () => {})
    lifecycle.start()
    vi.advanceTimersByTime(1000)
    expect(lifecycle.getState()).toBe('running')

    tracker.untrack(timer)
    vi.advanceTimersByTime(10)
    expect(lifecycle.getState()).toBe('exited')
  })

  it('should re-read the tracker when the deferred check runs', () => {
    const { tracker, lifecycle } = createTestLifecycle()
    const first = {}
    const second = {}
    tracker.track(first, 'sound', () => {})
    lifecycle.start()
    vi.advanceTimersByTime(10)

    // Release one and acquire another in the same call stack
    tracker.untrack(first)
    tracker.track(second, 'sound', () => {})
    vi.advanceTimersByTime(50)

    expect(lifecycle.getState()).toBe('running')
  })

  it('should stay up while a window is open', () => {
    const { lifecycle } = createTestLifecycle()
    const window = { close: vi.fn() }

    lifecycle.openWindow(window)
    lifecycle.start()
    vi.advanceTimersByTime(100)
    expect(lifecycle.getState()).toBe('running')

    lifecycle.closeWindow(window)
    vi.advanceTimersByTime(10)
    expect(lifecycle.getState()).toBe('exited')
  })

  it('should treat exited as terminal', () => {
    const { lifecycle } = createTestLifecycle()
    const onExit = vi.fn()
    lifecycle.exit$.subscribe(onExit)

    lifecycle.start()
    vi.advanceTimersByTime(10)
    lifecycle.start()
    lifecycle.scheduleQuiescenceCheck()
    vi.advanceTimersByTime(10)

    expect(lifecycle.checkQuiescence()).toBe(false)
    expect(lifecycle.getState()).toBe('exited')
    expect(onExit).toHaveBeenCalledTimes(1)
  })

  it('should close open windows and exit when halted', async () => {
    const { tracker, lifecycle } = createTestLifecycle()
    const window = { close: vi.fn() }
    const onExit = vi.fn()
    lifecycle.exit$.subscribe(onExit)

    lifecycle.openWindow(window)
    lifecycle.start()
    lifecycle.halt()

    expect(window.close).toHaveBeenCalledTimes(1)
    expect(lifecycle.openWindowCount()).toBe(0)
    expect(lifecycle.getState()).toBe('exited')
    expect(onExit).toHaveBeenCalledTimes(1)
    await expect(lifecycle.whenExited()).resolves.toBeUndefined()

    // Releases after the halt schedule nothing
    tracker.untrack({})
    expect(vi.getTimerCount()).toBe(0)
  })
})

describe('exit quiescence across chained timers', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should not exit while a timer started from another timer is live', async () => {
    const runtime = await createRuntime({ logging: 'silent' })
    let second: Timer | null = null

    const exited = runtime.run(({ createTimer }) => {
      const first = createTimer(10, () => {
        first.stop()
        second?.start()
      })
      second = createTimer(10, () => second?.stop())
      first.start()
    })

    const { lifecycle, tracker } = runtime.context

    vi.advanceTimersByTime(0)
    expect(lifecycle.getState()).toBe('running')

    // First fires at 10, stops itself and starts the second
    vi.advanceTimersByTime(10)
    expect(tracker.size()).toBe(1)

    // The second stops itself at 20; its untrack restarts the debounced
    // check, which now runs at 30
    vi.advanceTimersByTime(15)
    expect(lifecycle.getState()).toBe('running')
    expect(tracker.size()).toBe(0)

    vi.advanceTimersByTime(5)
    expect(lifecycle.getState()).toBe('exited')
    await expect(exited).resolves.toBeUndefined()
  })
})
