/**
 * Event Router
 *
 * Turns raw toolkit input into the four events user handlers see and
 * delivers each to at most one primary and one secondary handler.
 *
 * Philosophy:
 * - One handler pair per event kind, a new registration replaces the old
 * - Nothing is delivered until start()
 * - Handler errors are not caught here
 */

import { createEventBus } from '@sketchloop/system'
import type { Unsubscribe } from '@sketchloop/system'
import { canvasKeywords } from './vocabulary'
import type { InputEventKind } from './vocabulary'

// ============================================================================
// Types
// ============================================================================

export type MousePosition = readonly [number, number]

export type InputEvents = {
  keydown: number
  keyup: number
  mouseclick: MousePosition
  mousedrag: MousePosition
}

export type InputHandler<K extends InputEventKind> = (payload: InputEvents[K]) => void

export type RawInputEvent =
  | { type: typeof canvasKeywords.rawInput.keyPress; key: number }
  | { type: typeof canvasKeywords.rawInput.keyRelease; key: number }
  | { type: typeof canvasKeywords.rawInput.mousePress; x: number; y: number }
  | { type: typeof canvasKeywords.rawInput.mouseRelease; x: number; y: number }
  | { type: typeof canvasKeywords.rawInput.mouseMove; x: number; y: number }

// ============================================================================
// Router
// ============================================================================

export function createEventRouter() {
  const bus = createEventBus<InputEvents>()
  const registrations: { [K in InputEventKind]?: Array<Unsubscribe> } = {}

  let started = false
  let buttonDown = false

  const deliver = <K extends InputEventKind>(kind: K, payload: InputEvents[K]) => {
    if (!started) return
    bus.emit(kind, payload)
  }

  /**
   * Register the handler pair for `kind`, replacing any previous pair.
   * The primary runs first, then the secondary, with the same payload.
   */
  const setHandler = <K extends InputEventKind>(
    kind: K,
    handler: InputHandler<K>,
    secondary?: InputHandler<K>,
  ) => {
    registrations[kind]?.forEach((unsubscribe) => unsubscribe())

    // Wrapped so registering one function twice still yields two entries
    const next = [bus.on(kind, (payload) => handler(payload))]
    if (secondary) {
      next.push(bus.on(kind, (payload) => secondary(payload)))
    }
    registrations[kind] = next
  }

  const handleRaw = (event: RawInputEvent) => {
    switch (event.type) {
      case canvasKeywords.rawInput.keyPress:
        deliver(canvasKeywords.events.keydown, Math.trunc(event.key))
        return
      case canvasKeywords.rawInput.keyRelease:
        deliver(canvasKeywords.events.keyup, Math.trunc(event.key))
        return
      case canvasKeywords.rawInput.mousePress:
        buttonDown = true
        return
      case canvasKeywords.rawInput.mouseRelease:
        buttonDown = false
        deliver(canvasKeywords.events.mouseclick, [Math.trunc(event.x), Math.trunc(event.y)])
        return
      case canvasKeywords.rawInput.mouseMove:
        if (!buttonDown) return
        deliver(canvasKeywords.events.mousedrag, [Math.trunc(event.x), Math.trunc(event.y)])
        return
    }
  }

  return {
    setHandler,
    handleRaw,
    start: () => {
      started = true
    },
    isStarted: () => started,
    /**
     * Drop every handler and stop delivering
     */
    stop: () => {
      started = false
      buttonDown = false
      bus.clear()
    },
  }
}

export type EventRouter = ReturnType<typeof createEventRouter>
