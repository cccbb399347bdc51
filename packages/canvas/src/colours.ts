/**
 * Colours
 *
 * Parses the CSS colour strings scripts pass to draw calls and backgrounds:
 * named colours (any case), #rgb / #rrggbb, rgb()/rgba() with 0-255 or
 * percentage channels, hsl()/hsla() with hue 0-360 and percentage s/l.
 * A trailing `)` is optional. Values out of range are rejected, never clamped.
 */

import chroma from 'chroma-js'
import { ArgumentError } from '@sketchloop/system'
import colourNames from './data/colourNames.json'

// ============================================================================
// Types
// ============================================================================

export type ColourSpec =
  | { type: 'named'; name: string; hex: string }
  | { type: 'hex'; hex: string }
  | { type: 'rgb'; r: number; g: number; b: number }
  | { type: 'rgba'; r: number; g: number; b: number; a: number }
  | { type: 'hsl'; h: number; s: number; l: number }
  | { type: 'hsla'; h: number; s: number; l: number; a: number }

export class ColourParseError extends ArgumentError {
  readonly input: string

  constructor(input: string, reason: string) {
    super(`invalid colour '${input}': ${reason}`)
    this.name = 'ColourParseError'
    this.input = input
  }
}

// ============================================================================
// Parsing
// ============================================================================

const NAMED_COLOURS: Readonly<Record<string, string | undefined>> = colourNames

const NUMBER = /-?(?:\d+\.?\d*|\.\d+)/g
const HEX = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i

const readNumbers = (input: string): Array<number> =>
  (input.match(NUMBER) ?? []).map(Number)

const inRange = (value: number, max: number) => value >= 0 && value <= max

const expandHex = (hex: string) => {
  const digits = hex.slice(1).toLowerCase()
  if (digits.length === 6) return `#${digits}`
  return `#${[...digits].map((d) => d + d).join('')}`
}

function parseRgb(input: string): ColourSpec {
  const numbers = readNumbers(input)
  const [r, g, b, a] = numbers
  if (r === undefined || g === undefined || b === undefined) {
    throw new ColourParseError(input, 'expected at least 3 values')
  }

  // Percentages apply to the whole string, as in rgb(20%, 45%, 83.2%)
  const scale = input.includes('%') ? 255 / 100 : 1
  const channels = [r, g, b].map((value) => value * scale)
  if (!channels.every((value) => inRange(value, 255))) {
    throw new ColourParseError(input, 'channels must be within 0-255 or 0%-100%')
  }

  const [red = 0, green = 0, blue = 0] = channels
  if (a === undefined) return { type: 'rgb', r: red, g: green, b: blue }
  if (!inRange(a, 1)) throw new ColourParseError(input, 'alpha must be within 0-1')
  return { type: 'rgba', r: red, g: green, b: blue, a }
}

function parseHsl(input: string): ColourSpec {
  const [h, s, l, a] = readNumbers(input)
  if (h === undefined || s === undefined || l === undefined) {
    throw new ColourParseError(input, 'expected at least 3 values')
  }
  if (!inRange(h, 360)) throw new ColourParseError(input, 'hue must be within 0-360')
  if (!inRange(s, 100) || !inRange(l, 100)) {
    throw new ColourParseError(input, 'saturation and lightness must be within 0-100')
  }

  const saturation = s / 100
  const lightness = l / 100
  if (a === undefined) return { type: 'hsl', h, s: saturation, l: lightness }
  if (!inRange(a, 1)) throw new ColourParseError(input, 'alpha must be within 0-1')
  return { type: 'hsla', h, s: saturation, l: lightness, a }
}

function parseUncached(input: string): ColourSpec {
  const trimmed = input.trim()
  const lower = trimmed.toLowerCase()

  if (lower.startsWith('#')) {
    if (!HEX.test(trimmed)) throw new ColourParseError(input, 'expected #rgb or #rrggbb')
    return { type: 'hex', hex: expandHex(trimmed) }
  }
  if (lower.startsWith('rgb')) return parseRgb(trimmed)
  if (lower.startsWith('hsl')) return parseHsl(trimmed)

  const hex = NAMED_COLOURS[lower]
  if (hex === undefined) throw new ColourParseError(input, 'unknown colour name')
  return { type: 'named', name: lower, hex }
}

// ============================================================================
// Caching
// ============================================================================

/**
 * Distinct strings kept per cache. Scripts that build colour strings per
 * frame would otherwise grow the caches without bound.
 */
export const COLOUR_CACHE_LIMIT = 512

// Least recently used entries go first
const createBoundedCache = <TValue>(limit: number) => {
  const entries = new Map<string, TValue>()
  return {
    get: (key: string): TValue | undefined => {
      const value = entries.get(key)
      if (value === undefined) return undefined
      entries.delete(key)
      entries.set(key, value)
      return value
    },
    set: (key: string, value: TValue) => {
      entries.delete(key)
      entries.set(key, value)
      if (entries.size > limit) {
        const oldest = entries.keys().next()
        if (!oldest.done) entries.delete(oldest.value)
      }
    },
  }
}

const parsed = createBoundedCache<ColourSpec>(COLOUR_CACHE_LIMIT)

/**
 * Parse a colour string, throwing ColourParseError when it is not one
 */
export function parseColour(input: string): ColourSpec {
  const cached = parsed.get(input)
  if (cached) return cached

  const spec = parseUncached(input)
  parsed.set(input, spec)
  return spec
}

// ============================================================================
// Output
// ============================================================================

export function toCss(spec: ColourSpec): string {
  switch (spec.type) {
    case 'named':
    case 'hex':
      return chroma(spec.hex).css()
    case 'rgb':
      return chroma(spec.r, spec.g, spec.b).css()
    case 'rgba':
      return chroma(spec.r, spec.g, spec.b).alpha(spec.a).css()
    case 'hsl':
      return chroma(spec.h, spec.s, spec.l, 'hsl').css()
    case 'hsla':
      return chroma(spec.h, spec.s, spec.l, 'hsl').alpha(spec.a).css()
  }
}

const css = createBoundedCache<string>(COLOUR_CACHE_LIMIT)

/**
 * CSS colour for a user colour string, parsed and converted once
 */
export function colourToCss(input: string): string {
  const cached = css.get(input)
  if (cached !== undefined) return cached

  const value = toCss(parseColour(input))
  css.set(input, value)
  return value
}

export function isColour(input: string): boolean {
  try {
    parseColour(input)
    return true
  } catch (error) {
    if (error instanceof ColourParseError) return false
    throw error
  }
}
