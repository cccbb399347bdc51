/**
 * Runtime
 *
 * The API scripts program against: frames, timers, images, sounds and key
 * codes, over one RuntimeContext.
 *
 * @example
 * ```ts
 * const runtime = await createRuntime()
 *
 * await runtime.run(({ createFrame }) => {
 *   const frame = createFrame('Home', 300, 200)
 *   frame.setDrawHandler((canvas) => canvas.drawText('Hello', [20, 100], 24, 'White'))
 *   frame.start()
 * })
 * ```
 */

import type { ImageHandle } from '@sketchloop/canvas'
import { createRuntimeConfig } from './config'
import type { RuntimeConfigInput } from './config'
import { startRuntimeContext } from './context'
import type { RuntimeContext, RuntimeServices } from './context'
import { createFrame as createFrameIn } from './frame'
import type { Frame } from './frame'
import { KEY_MAP, keyCode } from './keys'
import { loadSound as loadSoundIn } from './sound'
import type { Sound } from './sound'
import { createTimer as createTimerIn } from './timer'
import type { Timer } from './timer'

export type Runtime = {
  context: RuntimeContext
  /**
   * Open a frame. Any frame opened before it is closed first.
   */
  createFrame: (
    title: string,
    canvasWidth: number,
    canvasHeight: number,
    controlWidth?: number,
  ) => Frame
  createTimer: (intervalMs: number, handler: () => void) => Timer
  loadImage: (url: string) => ImageHandle
  loadSound: (url: string) => Sound
  KEY_MAP: Readonly<Record<string, number>>
  keyCode: (name: string) => number
  /**
   * Run `setup` now, start the lifecycle once it returns, and resolve when
   * the runtime exits. Only one run per runtime.
   */
  run: (setup: (runtime: Runtime) => void) => Promise<void>
  /**
   * Stop everything still live and close the frame. The pending run
   * resolves.
   */
  halt: () => Promise<void>
}

export async function createRuntime(
  overrides: RuntimeConfigInput = {},
  services: RuntimeServices = {},
): Promise<Runtime> {
  const context = await startRuntimeContext(createRuntimeConfig(overrides), services)
  let currentFrame: Frame | null = null
  let hasRun = false

  const runtime: Runtime = {
    context,

    createFrame: (title, canvasWidth, canvasHeight, controlWidth) => {
      currentFrame?.close()
      currentFrame = createFrameIn(context, { title, canvasWidth, canvasHeight, controlWidth })
      return currentFrame
    },

    createTimer: (intervalMs, handler) => createTimerIn(context, intervalMs, handler),

    loadImage: (url) => context.images.load(url),

    loadSound: (url) => loadSoundIn(context, url),

    KEY_MAP,
    keyCode,

    run: (setup) => {
      if (hasRun) {
        throw new Error('[Runtime] run() has already been called on this runtime')
      }
      hasRun = true

      setup(runtime)
      setTimeout(() => context.lifecycle.start(), context.config.startDelayMs)

      return context.lifecycle.whenExited()
    },

    halt: () => context.halt(),
  }

  return runtime
}
