/**
 * Canvas Keywords
 *
 * Canonical names for draw primitives, font faces and input events.
 *
 * Philosophy:
 * - No magic strings anywhere in the codebase
 * - Recorder, painter and router all read from here
 */

export const canvasKeywords = {
  /**
   * Draw primitive kinds recorded into a frame buffer
   */
  primitives: {
    line: 'line',
    polyline: 'polyline',
    polygon: 'polygon',
    circle: 'circle',
    arc: 'arc',
    point: 'point',
    text: 'text',
    image: 'image',
  },

  /**
   * Font faces accepted by drawText and text measurement
   */
  fontFaces: {
    serif: 'serif',
    sansSerif: 'sans-serif',
    monospace: 'monospace',
  },

  /**
   * Events delivered to user handlers
   */
  events: {
    keydown: 'keydown',
    keyup: 'keyup',
    mouseclick: 'mouseclick',
    mousedrag: 'mousedrag',
  },

  /**
   * Raw toolkit input, before routing
   */
  rawInput: {
    keyPress: 'keyPress',
    keyRelease: 'keyRelease',
    mousePress: 'mousePress',
    mouseRelease: 'mouseRelease',
    mouseMove: 'mouseMove',
  },

  /**
   * Image asset load states
   */
  assetStates: {
    loading: 'loading',
    ready: 'ready',
    failed: 'failed',
  },
} as const

// ============================================================================
// Type Exports
// ============================================================================

export type PrimitiveKind =
  (typeof canvasKeywords.primitives)[keyof typeof canvasKeywords.primitives]

export type FontFace =
  (typeof canvasKeywords.fontFaces)[keyof typeof canvasKeywords.fontFaces]

export type InputEventKind =
  (typeof canvasKeywords.events)[keyof typeof canvasKeywords.events]

export type RawInputKind =
  (typeof canvasKeywords.rawInput)[keyof typeof canvasKeywords.rawInput]

export type AssetState =
  (typeof canvasKeywords.assetStates)[keyof typeof canvasKeywords.assetStates]
