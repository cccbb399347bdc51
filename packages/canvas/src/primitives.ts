/**
 * Draw Primitives
 *
 * One immutable drawing instruction per user draw call. Geometry is already
 * truncated to integers when a primitive is built, and colours are kept as the
 * string the user passed once it parsed.
 *
 * Equality is structural and drives the render diff: a tick whose buffer
 * equals the stored one causes no repaint.
 */

import { canvasKeywords } from './vocabulary'
import type { FontFace, Point, Size } from './vocabulary'
import type { ImageHandle } from './images'

export type LinePrimitive = {
  kind: typeof canvasKeywords.primitives.line
  from: Point
  to: Point
  lineWidth: number
  colour: string
}

export type PolylinePrimitive = {
  kind: typeof canvasKeywords.primitives.polyline
  points: ReadonlyArray<Point>
  lineWidth: number
  colour: string
}

export type PolygonPrimitive = {
  kind: typeof canvasKeywords.primitives.polygon
  points: ReadonlyArray<Point>
  lineWidth: number
  colour: string
  fill: string | null
}

export type CirclePrimitive = {
  kind: typeof canvasKeywords.primitives.circle
  center: Point
  radius: number
  lineWidth: number
  colour: string
  fill: string | null
}

/**
 * Angles in native units, see toNativeArc
 */
export type ArcPrimitive = {
  kind: typeof canvasKeywords.primitives.arc
  center: Point
  radius: number
  start: number
  sweep: number
  lineWidth: number
  colour: string
  fill: string | null
}

export type PointPrimitive = {
  kind: typeof canvasKeywords.primitives.point
  point: Point
  colour: string
}

/**
 * `point` is the lower-left corner of the text
 */
export type TextPrimitive = {
  kind: typeof canvasKeywords.primitives.text
  text: string
  point: Point
  fontSize: number
  colour: string
  face: FontFace
}

export type ImagePrimitive = {
  kind: typeof canvasKeywords.primitives.image
  image: ImageHandle
  sourceCenter: Point
  sourceSize: Size
  destCenter: Point
  destSize: Size
  rotation: number
}

export type DrawPrimitive =
  | LinePrimitive
  | PolylinePrimitive
  | PolygonPrimitive
  | CirclePrimitive
  | ArcPrimitive
  | PointPrimitive
  | TextPrimitive
  | ImagePrimitive

export type FrameBuffer = ReadonlyArray<DrawPrimitive>

// ============================================================================
// Structural Equality
// ============================================================================

const pairsEqual = (a: readonly [number, number], b: readonly [number, number]) =>
  a[0] === b[0] && a[1] === b[1]

const pointListsEqual = (a: ReadonlyArray<Point>, b: ReadonlyArray<Point>) => {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    const pa = a[i]
    const pb = b[i]
    if (!pa || !pb || !pairsEqual(pa, pb)) return false
  }
  return true
}

export function primitivesEqual(a: DrawPrimitive, b: DrawPrimitive): boolean {
  switch (a.kind) {
    case canvasKeywords.primitives.line:
      return (
        b.kind === a.kind &&
        pairsEqual(a.from, b.from) &&
        pairsEqual(a.to, b.to) &&
        a.lineWidth === b.lineWidth &&
        a.colour === b.colour
      )
    case canvasKeywords.primitives.polyline:
      return (
        b.kind === a.kind &&
        pointListsEqual(a.points, b.points) &&
        a.lineWidth === b.lineWidth &&
        a.colour === b.colour
      )
    case canvasKeywords.primitives.polygon:
      return (
        b.kind === a.kind &&
        pointListsEqual(a.points, b.points) &&
        a.lineWidth === b.lineWidth &&
        a.colour === b.colour &&
        a.fill === b.fill
      )
    case canvasKeywords.primitives.circle:
      return (
        b.kind === a.kind &&
        pairsEqual(a.center, b.center) &&
        a.radius === b.radius &&
        a.lineWidth === b.lineWidth &&
        a.colour === b.colour &&
        a.fill === b.fill
      )
    case canvasKeywords.primitives.arc:
      return (
        b.kind === a.kind &&
        pairsEqual(a.center, b.center) &&
        a.radius === b.radius &&
        a.start === b.start &&
        a.sweep === b.sweep &&
        a.lineWidth === b.lineWidth &&
        a.colour === b.colour &&
        a.fill === b.fill
      )
    case canvasKeywords.primitives.point:
      return b.kind === a.kind && pairsEqual(a.point, b.point) && a.colour === b.colour
    case canvasKeywords.primitives.text:
      return (
        b.kind === a.kind &&
        a.text === b.text &&
        pairsEqual(a.point, b.point) &&
        a.fontSize === b.fontSize &&
        a.colour === b.colour &&
        a.face === b.face
      )
    case canvasKeywords.primitives.image:
      // Same handle, not same pixels: a handle that finishes loading between
      // ticks is picked up because the recorder only emits ready images
      return (
        b.kind === a.kind &&
        a.image === b.image &&
        pairsEqual(a.sourceCenter, b.sourceCenter) &&
        pairsEqual(a.sourceSize, b.sourceSize) &&
        pairsEqual(a.destCenter, b.destCenter) &&
        pairsEqual(a.destSize, b.destSize) &&
        a.rotation === b.rotation
      )
  }
}

export function frameBuffersEqual(a: FrameBuffer, b: FrameBuffer): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    const pa = a[i]
    const pb = b[i]
    if (!pa || !pb || !primitivesEqual(pa, pb)) return false
  }
  return true
}
