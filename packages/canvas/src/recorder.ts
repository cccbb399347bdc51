/**
 * Draw Recorder
 *
 * The canvas object user draw handlers receive. Each call validates its
 * arguments, truncates geometry to integers and appends one primitive to the
 * buffer of the tick in progress. Nothing is painted here.
 *
 * Argument errors throw ArgumentError at the offending call.
 */

import { validate } from '@sketchloop/system'
import { z } from 'zod'
import { toNativeArc } from './angles'
import { parseColour } from './colours'
import { toFontSpec } from './fonts'
import type { ImageCache, ImageHandle } from './images'
import type { DrawPrimitive } from './primitives'
import {
  canvasKeywords,
  pointListSchema,
  pointSchema,
  positiveIntegerSchema,
  printableTextSchema,
  rotationSchema,
  sizeSchema,
} from './vocabulary'
import type { Point } from './vocabulary'

/**
 * A point as scripts pass it: any two numbers
 */
export type PointInput = readonly [number, number]

export type SizeInput = readonly [number, number]

const angleSchema = z.number().finite()

// Returns the input unchanged so the user's spelling is what gets compared
const checkColour = (colour: string, argument: string) => {
  validate(z.string(), colour, argument)
  parseColour(colour)
  return colour
}

const checkFill = (fill: string | null | undefined) =>
  fill === undefined || fill === null ? null : checkColour(fill, 'fill colour')

const toPoint = (point: PointInput, argument = 'point'): Point =>
  validate(pointSchema, point, argument)

const toPoints = (points: ReadonlyArray<PointInput>) =>
  validate(pointListSchema, points, 'point list')

const toLineWidth = (lineWidth: number) =>
  validate(positiveIntegerSchema, lineWidth, 'line width')

const toRadius = (radius: number) => validate(positiveIntegerSchema, radius, 'radius')

export type DrawRecorderOptions = {
  images: Pick<ImageCache, 'isSourceInBounds'>
  emit: (primitive: DrawPrimitive) => void
}

export function createDrawRecorder({ images, emit }: DrawRecorderOptions) {
  return {
    /**
     * `point` is the lower-left corner of the text
     */
    drawText(
      text: string,
      point: PointInput,
      fontSize: number,
      fontColour: string,
      fontFace = 'serif',
    ) {
      const printable = validate(printableTextSchema, text, 'text')
      const at = toPoint(point)
      const font = toFontSpec(fontSize, fontFace)
      emit({
        kind: canvasKeywords.primitives.text,
        text: printable,
        point: at,
        fontSize: font.size,
        colour: checkColour(fontColour, 'font colour'),
        face: font.face,
      })
    },

    drawLine(point1: PointInput, point2: PointInput, lineWidth: number, lineColour: string) {
      emit({
        kind: canvasKeywords.primitives.line,
        from: toPoint(point1, 'first point'),
        to: toPoint(point2, 'second point'),
        lineWidth: toLineWidth(lineWidth),
        colour: checkColour(lineColour, 'line colour'),
      })
    },

    drawPolyline(points: ReadonlyArray<PointInput>, lineWidth: number, lineColour: string) {
      emit({
        kind: canvasKeywords.primitives.polyline,
        points: toPoints(points),
        lineWidth: toLineWidth(lineWidth),
        colour: checkColour(lineColour, 'line colour'),
      })
    },

    drawPolygon(
      points: ReadonlyArray<PointInput>,
      lineWidth: number,
      lineColour: string,
      fillColour?: string | null,
    ) {
      emit({
        kind: canvasKeywords.primitives.polygon,
        points: toPoints(points),
        lineWidth: toLineWidth(lineWidth),
        colour: checkColour(lineColour, 'line colour'),
        fill: checkFill(fillColour),
      })
    },

    drawCircle(
      center: PointInput,
      radius: number,
      lineWidth: number,
      lineColour: string,
      fillColour?: string | null,
    ) {
      emit({
        kind: canvasKeywords.primitives.circle,
        center: toPoint(center, 'center point'),
        radius: toRadius(radius),
        lineWidth: toLineWidth(lineWidth),
        colour: checkColour(lineColour, 'line colour'),
        fill: checkFill(fillColour),
      })
    },

    /**
     * Angles in radians, clockwise from 3 o'clock
     */
    drawArc(
      center: PointInput,
      radius: number,
      startAngle: number,
      endAngle: number,
      lineWidth: number,
      lineColour: string,
      fillColour?: string | null,
    ) {
      const arc = toNativeArc(
        validate(angleSchema, startAngle, 'start angle'),
        validate(angleSchema, endAngle, 'end angle'),
      )
      emit({
        kind: canvasKeywords.primitives.arc,
        center: toPoint(center, 'center point'),
        radius: toRadius(radius),
        start: arc.start,
        sweep: arc.sweep,
        lineWidth: toLineWidth(lineWidth),
        colour: checkColour(lineColour, 'line colour'),
        fill: checkFill(fillColour),
      })
    },

    drawPoint(point: PointInput, colour: string) {
      emit({
        kind: canvasKeywords.primitives.point,
        point: toPoint(point),
        colour: checkColour(colour, 'colour'),
      })
    },

    /**
     * Draw part of a loaded image, scaled to `destSize` and rotated clockwise
     * by `rotation` radians about `destCenter`.
     *
     * Nothing is drawn while the image is loading, after it failed, or when
     * the source window reaches outside the image.
     */
    drawImage(
      image: ImageHandle,
      sourceCenter: PointInput,
      sourceSize: SizeInput,
      destCenter: PointInput,
      destSize: SizeInput,
      rotation = 0,
    ) {
      const source = toPoint(sourceCenter, 'source center')
      const sourceWH = validate(sizeSchema, sourceSize, 'source size')
      const dest = toPoint(destCenter, 'destination center')
      const destWH = validate(sizeSchema, destSize, 'destination size')
      const angle = validate(rotationSchema, rotation, 'rotation')

      if (image.getWidth() === 0 || image.getHeight() === 0) return
      if (!images.isSourceInBounds(image, source, sourceWH)) return

      emit({
        kind: canvasKeywords.primitives.image,
        image,
        sourceCenter: source,
        sourceSize: sourceWH,
        destCenter: dest,
        destSize: destWH,
        rotation: angle,
      })
    },
  }
}

export type DrawRecorder = ReturnType<typeof createDrawRecorder>
