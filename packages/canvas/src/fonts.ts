/**
 * Fonts
 *
 * Font faces map straight onto CSS generic families; measurement uses a
 * shared 1x1 canvas.
 */

import { createCanvas } from '@napi-rs/canvas'
import type { SKRSContext2D } from '@napi-rs/canvas'
import { validate } from '@sketchloop/system'
import { fontFaceSchema, positiveIntegerSchema, printableTextSchema } from './vocabulary'
import type { FontFace } from './vocabulary'

export type FontSpec = {
  size: number
  face: FontFace
}

/**
 * Validate and normalize a font size and face
 */
export function toFontSpec(size: number, face: string): FontSpec {
  return {
    size: validate(positiveIntegerSchema, size, 'font size'),
    face: validate(fontFaceSchema, face, 'font face'),
  }
}

export function toCssFont(size: number, face: FontFace): string {
  return `${size}px ${face}`
}

let measureContext: SKRSContext2D | null = null

const getMeasureContext = () => {
  if (!measureContext) {
    measureContext = createCanvas(1, 1).getContext('2d')
  }
  return measureContext
}

/**
 * Width in whole pixels of `text` drawn at `size` in `face`
 */
export function measureTextWidth(text: string, size: number, face: string): number {
  const printable = validate(printableTextSchema, text, 'text')
  const font = toFontSpec(size, face)

  const ctx = getMeasureContext()
  ctx.font = toCssFont(font.size, font.face)
  return Math.round(ctx.measureText(printable).width)
}
