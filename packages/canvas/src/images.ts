/**
 * Image Asset Cache
 *
 * Loads images asynchronously and memoizes the render-ready views cut from
 * them. A handle starts out `loading` and settles exactly once, to `ready`
 * or `failed`. Failures never throw; they log a warning and leave the
 * handle at zero size, which drawing code skips.
 *
 * Views are keyed by (source center, source size, target size, rotation),
 * per handle. The same key always returns the same Canvas.
 */

import { createCanvas, loadImage } from '@napi-rs/canvas'
import type { Canvas, Image } from '@napi-rs/canvas'
import type { FetchBytes, Logger } from '@sketchloop/system'
import { canvasKeywords } from './vocabulary'
import type { AssetState, Point, Size } from './vocabulary'

// ============================================================================
// Types
// ============================================================================

export type ImageHandle = {
  readonly url: string
  readonly state: AssetState
  /**
   * 0 until the image is ready
   */
  getWidth: () => number
  /**
   * 0 until the image is ready
   */
  getHeight: () => number
  isReady: () => boolean
  /**
   * Resolves once the load is ready or failed. Never rejects.
   */
  whenSettled: () => Promise<void>
}

export type DecodeImage = (bytes: Uint8Array) => Promise<Image>

export type ImageCacheOptions = {
  fetchBytes: FetchBytes
  log: Logger
  decode?: DecodeImage
}

const decodeWithCanvas: DecodeImage = (bytes) => loadImage(Buffer.from(bytes))

// ============================================================================
// Geometry
// ============================================================================

type SourceWindow = { left: number; top: number; width: number; height: number }

const sourceWindow = (center: Point, size: Size): SourceWindow => ({
  left: Math.round(center[0] - size[0] / 2),
  top: Math.round(center[1] - size[1] / 2),
  width: size[0],
  height: size[1],
})

const fitsInside = (window: SourceWindow, width: number, height: number) =>
  window.left >= 0 &&
  window.top >= 0 &&
  window.left + window.width <= width &&
  window.top + window.height <= height

/**
 * Size of the box holding a `width` x `height` rectangle turned by `rotation`
 */
export function rotatedBounds(width: number, height: number, rotation: number): Size {
  const cos = Math.abs(Math.cos(rotation))
  const sin = Math.abs(Math.sin(rotation))
  // Float noise at quarter turns would otherwise add a pixel
  return [
    Math.max(1, Math.ceil(width * cos + height * sin - 1e-9)),
    Math.max(1, Math.ceil(width * sin + height * cos - 1e-9)),
  ]
}

// ============================================================================
// Image Cache
// ============================================================================

export function createImageCache(options: ImageCacheOptions) {
  const { fetchBytes, log, decode = decodeWithCanvas } = options

  const decoded = new WeakMap<ImageHandle, Image>()
  let views = new WeakMap<ImageHandle, Map<string, Canvas>>()

  /**
   * Whether the source window lies inside the decoded image.
   * False for any handle that is not ready.
   */
  const isSourceInBounds = (handle: ImageHandle, sourceCenter: Point, sourceSize: Size) => {
    const image = decoded.get(handle)
    if (!image) return false
    return fitsInside(sourceWindow(sourceCenter, sourceSize), image.width, image.height)
  }

  /**
   * Render-ready view of part of an image, or null while the handle is not
   * ready or when the source window reaches outside the image
   */
  const prepareView = (
    handle: ImageHandle,
    sourceCenter: Point,
    sourceSize: Size,
    destSize: Size,
    rotation = 0,
  ): Canvas | null => {
    const image = decoded.get(handle)
    if (!image) return null

    const window = sourceWindow(sourceCenter, sourceSize)
    if (!fitsInside(window, image.width, image.height)) return null

    const key = `${sourceCenter.join(',')}|${sourceSize.join(',')}|${destSize.join(',')}|${rotation}`
    let cached = views.get(handle)
    if (!cached) {
      cached = new Map()
      views.set(handle, cached)
    }
    const existing = cached.get(key)
    if (existing) return existing

    const [destWidth, destHeight] = destSize
    let view: Canvas
    if (rotation === 0) {
      view = createCanvas(destWidth, destHeight)
      view
        .getContext('2d')
        .drawImage(image, window.left, window.top, window.width, window.height, 0, 0, destWidth, destHeight)
    } else {
      const [boundsWidth, boundsHeight] = rotatedBounds(destWidth, destHeight, rotation)
      view = createCanvas(boundsWidth, boundsHeight)
      const ctx = view.getContext('2d')
      ctx.translate(boundsWidth / 2, boundsHeight / 2)
      ctx.rotate(rotation)
      ctx.drawImage(
        image,
        window.left,
        window.top,
        window.width,
        window.height,
        -destWidth / 2,
        -destHeight / 2,
        destWidth,
        destHeight,
      )
    }

    cached.set(key, view)
    return view
  }

  /**
   * Start loading an image. Returns immediately with a loading handle.
   */
  const load = (url: string): ImageHandle => {
    let state: AssetState = canvasKeywords.assetStates.loading
    let width = 0
    let height = 0

    const handle: ImageHandle = {
      url,
      get state() {
        return state
      },
      getWidth: () => width,
      getHeight: () => height,
      isReady: () => state === canvasKeywords.assetStates.ready,
      whenSettled: () => settled,
    }

    const onReady = (image: Image) => {
      if (image.width <= 0 || image.height <= 0) {
        onFailed(new Error('decoded image is empty'))
        return
      }
      decoded.set(handle, image)
      width = image.width
      height = image.height
      state = canvasKeywords.assetStates.ready
      prepareView(handle, [width / 2, height / 2], [width, height], [width, height])
    }

    const onFailed = (error: unknown) => {
      state = canvasKeywords.assetStates.failed
      log.warn(`Failed to load image ${url}:`, error instanceof Error ? error.message : error)
    }

    const settled = Promise.resolve()
      .then(() => fetchBytes(url))
      .then(decode)
      .then(onReady, onFailed)

    return handle
  }

  return {
    load,
    prepareView,
    isSourceInBounds,
    /**
     * Drop every prepared view. Loaded images stay decoded.
     */
    clearViews: () => {
      views = new WeakMap()
    },
  }
}

export type ImageCache = ReturnType<typeof createImageCache>
