/**
 * Canvas Schemas
 *
 * Record-time argument shapes. Every numeric value is truncated toward zero
 * before it is checked, so `lineWidth: 0.5` fails as a width of 0.
 */

import { z } from 'zod'
import { canvasKeywords } from './canvasKeywords'

const finite = z.number().finite()

/**
 * Number truncated to an integer
 */
export const integerSchema = finite.transform((value) => Math.trunc(value))

/**
 * [x, y] with both coordinates truncated
 */
export const pointSchema = z.tuple([integerSchema, integerSchema])

export type Point = z.infer<typeof pointSchema>

export const pointListSchema = z
  .array(pointSchema)
  .nonempty({ message: 'expected at least one point' })

export const positiveIntegerSchema = integerSchema.pipe(
  z.number().int().positive(),
)

/**
 * [width, height], truncated, both positive
 */
export const sizeSchema = z.tuple([positiveIntegerSchema, positiveIntegerSchema])

export type Size = z.infer<typeof sizeSchema>

export const fontFaceSchema = z.enum([
  canvasKeywords.fontFaces.serif,
  canvasKeywords.fontFaces.sansSerif,
  canvasKeywords.fontFaces.monospace,
])

/**
 * Text with no control characters
 */
export const printableTextSchema = z
  .string()
  .refine((text) => !/\p{Cc}/u.test(text), { message: 'text must be printable' })

export const rotationSchema = finite
