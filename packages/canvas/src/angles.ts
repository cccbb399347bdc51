/**
 * Angle conversion
 *
 * User angles are radians, clockwise from 3 o'clock on screen.
 * Native arc units are 1/16 degree with counter-clockwise positive,
 * so the sweep is negated.
 */

const NATIVE_UNITS_PER_TURN = 360 * 16

// Math.round(-0.4) is -0
const normalizeZero = (value: number) => (value === 0 ? 0 : value)

export function toNativeAngle(radians: number): number {
  return normalizeZero(Math.round((radians * NATIVE_UNITS_PER_TURN) / (2 * Math.PI)))
}

export type NativeArc = {
  start: number
  sweep: number
}

export function toNativeArc(startRadians: number, endRadians: number): NativeArc {
  return {
    start: toNativeAngle(startRadians),
    sweep: normalizeZero(-toNativeAngle(endRadians - startRadians)),
  }
}

/**
 * Back to canvas radians, for painters on a 2D context
 */
export function nativeToRadians(nativeAngle: number): number {
  return (nativeAngle / 16) * (Math.PI / 180)
}
