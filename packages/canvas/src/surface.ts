/**
 * Render Surface
 *
 * Owns the draw handler, the periodic render tick and the stored frame
 * buffer. Each tick records a fresh buffer through the user handler and
 * asks for a native repaint only when it differs structurally from the
 * stored one.
 *
 * Philosophy:
 * - Record every tick, repaint only on change
 * - Handler exceptions escape the tick untouched
 * - Painting is pull-based: the owner calls paint() when it repaints
 * - Recording is open only while the handler runs; draw calls made through
 *   a kept recorder outside a tick are dropped
 */

import { createIntervalLoop, validate } from '@sketchloop/system'
import { parseColour } from './colours'
import type { ImageCache } from './images'
import { paintFrame } from './painter'
import type { NativePainter } from './painter'
import { frameBuffersEqual } from './primitives'
import type { DrawPrimitive, FrameBuffer } from './primitives'
import { createDrawRecorder } from './recorder'
import type { DrawRecorder } from './recorder'
import { createEventRouter } from './router'
import { positiveIntegerSchema } from './vocabulary'

export type DrawHandler = (canvas: DrawRecorder) => void

export type RenderSurfaceOptions = {
  width: number
  height: number
  background: string
  tickIntervalMs: number
  images: Pick<ImageCache, 'isSourceInBounds' | 'prepareView'>
  /**
   * Called once per changed frame, and when the background changes
   */
  requestRepaint: () => void
}

export function createRenderSurface(options: RenderSurfaceOptions) {
  const { tickIntervalMs, images, requestRepaint } = options
  const width = validate(positiveIntegerSchema, options.width, 'canvas width')
  const height = validate(positiveIntegerSchema, options.height, 'canvas height')
  parseColour(options.background)

  let background = options.background
  let drawHandler: DrawHandler | null = null
  let started = false
  let stored: FrameBuffer = []
  let recording: Array<DrawPrimitive> | null = null

  const recorder = createDrawRecorder({
    images,
    emit: (primitive) => {
      recording?.push(primitive)
    },
  })

  const router = createEventRouter()

  const tick = () => {
    if (!drawHandler) return

    const next: Array<DrawPrimitive> = []
    recording = next
    try {
      drawHandler(recorder)
    } finally {
      recording = null
    }

    if (!frameBuffersEqual(next, stored)) {
      stored = next
      requestRepaint()
    }
  }

  const loop = createIntervalLoop({ intervalMs: tickIntervalMs, tick })

  return {
    width,
    height,
    router,

    /**
     * Replace the draw handler. The periodic tick is rescheduled from now.
     */
    setDrawHandler(handler: DrawHandler) {
      loop.stop()
      drawHandler = handler
      if (started) loop.start()
    },

    /**
     * Begin ticking and deliver input. Safe to call more than once.
     */
    start() {
      if (started) return
      started = true
      router.start()
      if (drawHandler) loop.start()
    },

    tick,

    setBackground(colour: string) {
      parseColour(colour)
      if (colour === background) return
      background = colour
      requestRepaint()
    },

    getBackground: () => background,

    getFrameBuffer: (): FrameBuffer => stored,

    isTicking: () => loop.isRunning(),

    paint(painter: NativePainter) {
      paintFrame(painter, stored, {
        width,
        height,
        background,
        prepareView: images.prepareView,
      })
    },

    /**
     * Cancel future ticks and input. A tick already running finishes.
     */
    stop() {
      started = false
      loop.stop()
      router.stop()
    },
  }
}

export type RenderSurface = ReturnType<typeof createRenderSurface>
