/**
 * Frames
 *
 * A frame is a headless window: an off-screen canvas the render surface
 * repaints into, plus a control panel. The window counts as open from
 * creation until close(), which keeps the runtime alive in between.
 *
 * Raw input is fed in through `input()`, standing in for the toolkit.
 */

import { createCanvas } from '@napi-rs/canvas'
import {
  createCanvasPainter,
  createRenderSurface,
  measureTextWidth,
  positiveIntegerSchema,
} from '@sketchloop/canvas'
import type {
  DrawHandler,
  InputHandler,
  RawInputEvent,
  RenderSurface,
} from '@sketchloop/canvas'
import { validate } from '@sketchloop/system'
import type { RuntimeContext } from './context'
import { createControlPanel } from './controlPanel'
import type { ButtonControl, Control, InputControl } from './controlPanel'

export type FrameOptions = {
  title: string
  canvasWidth: number
  canvasHeight: number
  controlWidth?: number
}

export type Frame = {
  readonly title: string
  setDrawHandler: (handler: DrawHandler) => void
  setKeydownHandler: (handler: InputHandler<'keydown'>) => void
  setKeyupHandler: (handler: InputHandler<'keyup'>) => void
  setMouseclickHandler: (handler: InputHandler<'mouseclick'>) => void
  setMousedragHandler: (handler: InputHandler<'mousedrag'>) => void
  setCanvasBackground: (colour: string) => void
  /**
   * Begin drawing and accepting input
   */
  start: () => void
  getCanvasTextwidth: (text: string, size: number, face?: string) => number
  addLabel: (text: string, width?: number) => Control
  addButton: (text: string, handler: () => void, width?: number) => ButtonControl
  addInput: (label: string, handler: (text: string) => void, width: number) => InputControl
  getKeyStatus: () => string
  getMouseStatus: () => string
  /**
   * Deliver raw input as the windowing toolkit would
   */
  input: (event: RawInputEvent) => void
  /**
   * PNG of the canvas as last painted
   */
  snapshot: () => Buffer
  readPixel: (x: number, y: number) => [number, number, number, number]
  getRepaintCount: () => number
  isOpen: () => boolean
  close: () => void
}

export function createFrame(context: RuntimeContext, options: FrameOptions): Frame {
  const { config, lifecycle, images } = context
  const log = context.createLog('Frame')

  const width = validate(positiveIntegerSchema, options.canvasWidth, 'canvas width')
  const height = validate(positiveIntegerSchema, options.canvasHeight, 'canvas height')
  const panel = createControlPanel(
    validate(positiveIntegerSchema, options.controlWidth ?? config.controlWidth, 'control width'),
  )

  const canvas = createCanvas(width, height)
  const ctx = canvas.getContext('2d')
  const painter = createCanvasPainter(ctx)

  let open = true
  let repaints = 0

  const surface: RenderSurface = createRenderSurface({
    width,
    height,
    background: config.background,
    tickIntervalMs: config.tickIntervalMs,
    images,
    requestRepaint: () => {
      if (!open) return
      repaints++
      surface.paint(painter)
    },
  })

  const frame: Frame = {
    title: options.title,

    setDrawHandler: (handler) => surface.setDrawHandler(handler),

    setKeydownHandler: (handler) => surface.router.setHandler('keydown', handler, panel.onKeydown),
    setKeyupHandler: (handler) => surface.router.setHandler('keyup', handler, panel.onKeyup),
    setMouseclickHandler: (handler) =>
      surface.router.setHandler('mouseclick', handler, panel.onMouseclick),
    setMousedragHandler: (handler) =>
      surface.router.setHandler('mousedrag', handler, panel.onMousedrag),

    setCanvasBackground: (colour) => surface.setBackground(colour),

    start: () => {
      if (!open) return
      surface.start()
    },

    getCanvasTextwidth: (text, size, face = 'serif') => measureTextWidth(text, size, face),

    addLabel: (text, labelWidth) => panel.addLabel(text, labelWidth),
    addButton: (text, handler, buttonWidth) => panel.addButton(text, handler, buttonWidth),
    addInput: (label, handler, inputWidth) => panel.addInput(label, handler, inputWidth),

    getKeyStatus: panel.getKeyStatus,
    getMouseStatus: panel.getMouseStatus,

    input: (event) => surface.router.handleRaw(event),

    snapshot: () => canvas.toBuffer('image/png'),

    readPixel: (x, y) => {
      const [r = 0, g = 0, b = 0, a = 0] = ctx.getImageData(x, y, 1, 1).data
      return [r, g, b, a]
    },

    getRepaintCount: () => repaints,

    isOpen: () => open,

    close: () => {
      if (!open) return
      open = false
      surface.stop()
      log.info(`Closed "${options.title}"`)
      lifecycle.closeWindow(frame)
    },
  }

  // A new window shows its background straight away
  surface.paint(painter)
  lifecycle.openWindow(frame)

  return frame
}
