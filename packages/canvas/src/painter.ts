/**
 * Native Painter
 *
 * The toolkit-side drawing interface a stored frame buffer is rendered
 * through. Geometry arrives as integers, colours as CSS strings and arc
 * angles in native units (1/16 degree, counter-clockwise positive).
 *
 * Each call is self-contained: pen, brush and font never leak from one
 * primitive into the next.
 */

import type { Canvas } from '@napi-rs/canvas'
import { colourToCss } from './colours'
import type { FontSpec } from './fonts'
import type { FrameBuffer } from './primitives'
import { canvasKeywords } from './vocabulary'
import type { Point, Size } from './vocabulary'
import type { ImageHandle } from './images'

export type Pen = {
  colour: string
  width: number
}

export interface NativePainter {
  fillBackground: (colour: string, width: number, height: number) => void
  drawLine: (x1: number, y1: number, x2: number, y2: number, pen: Pen) => void
  drawPolyline: (points: ReadonlyArray<Point>, pen: Pen) => void
  drawPolygon: (points: ReadonlyArray<Point>, pen: Pen, fill: string | null) => void
  drawEllipse: (x: number, y: number, w: number, h: number, pen: Pen, fill: string | null) => void
  drawArc: (x: number, y: number, w: number, h: number, start: number, sweep: number, pen: Pen) => void
  drawPie: (
    x: number,
    y: number,
    w: number,
    h: number,
    start: number,
    sweep: number,
    pen: Pen,
    fill: string,
  ) => void
  drawPoint: (x: number, y: number, colour: string) => void
  /**
   * (x, y) is the lower-left corner of the text
   */
  drawText: (text: string, x: number, y: number, font: FontSpec, colour: string) => void
  /**
   * Draws `view` centred on (cx, cy)
   */
  drawImage: (view: Canvas, cx: number, cy: number) => void
}

export type PrepareView = (
  handle: ImageHandle,
  sourceCenter: Point,
  sourceSize: Size,
  destSize: Size,
  rotation: number,
) => Canvas | null

export type PaintFrameOptions = {
  width: number
  height: number
  background: string
  prepareView: PrepareView
}

const pen = (colour: string, width: number): Pen => ({ colour: colourToCss(colour), width })

const fillOf = (fill: string | null) => (fill === null ? null : colourToCss(fill))

/**
 * Background first, then every primitive in emission order
 */
export function paintFrame(
  painter: NativePainter,
  buffer: FrameBuffer,
  options: PaintFrameOptions,
): void {
  painter.fillBackground(colourToCss(options.background), options.width, options.height)

  for (const primitive of buffer) {
    switch (primitive.kind) {
      case canvasKeywords.primitives.line:
        painter.drawLine(
          primitive.from[0],
          primitive.from[1],
          primitive.to[0],
          primitive.to[1],
          pen(primitive.colour, primitive.lineWidth),
        )
        break

      case canvasKeywords.primitives.polyline:
        painter.drawPolyline(primitive.points, pen(primitive.colour, primitive.lineWidth))
        break

      case canvasKeywords.primitives.polygon:
        painter.drawPolygon(
          primitive.points,
          pen(primitive.colour, primitive.lineWidth),
          fillOf(primitive.fill),
        )
        break

      case canvasKeywords.primitives.circle: {
        const { center, radius } = primitive
        painter.drawEllipse(
          center[0] - radius,
          center[1] - radius,
          radius * 2,
          radius * 2,
          pen(primitive.colour, primitive.lineWidth),
          fillOf(primitive.fill),
        )
        break
      }

      case canvasKeywords.primitives.arc: {
        const { center, radius, start, sweep } = primitive
        const linePen = pen(primitive.colour, primitive.lineWidth)
        const x = center[0] - radius
        const y = center[1] - radius
        if (primitive.fill === null) {
          painter.drawArc(x, y, radius * 2, radius * 2, start, sweep, linePen)
        } else {
          painter.drawPie(x, y, radius * 2, radius * 2, start, sweep, linePen, colourToCss(primitive.fill))
        }
        break
      }

      case canvasKeywords.primitives.point:
        painter.drawPoint(primitive.point[0], primitive.point[1], colourToCss(primitive.colour))
        break

      case canvasKeywords.primitives.text:
        painter.drawText(
          primitive.text,
          primitive.point[0],
          primitive.point[1],
          { size: primitive.fontSize, face: primitive.face },
          colourToCss(primitive.colour),
        )
        break

      case canvasKeywords.primitives.image: {
        const view = options.prepareView(
          primitive.image,
          primitive.sourceCenter,
          primitive.sourceSize,
          primitive.destSize,
          primitive.rotation,
        )
        if (view) painter.drawImage(view, primitive.destCenter[0], primitive.destCenter[1])
        break
      }
    }
  }
}
