import { describe, expect, it } from 'vitest'
import { nativeToRadians, toNativeAngle, toNativeArc } from '@sketchloop/canvas'

describe('toNativeAngle', () => {
  it('should convert quarter turns exactly', () => {
    expect(toNativeAngle(0)).toBe(0)
    expect(toNativeAngle(Math.PI / 2)).toBe(90 * 16)
    expect(toNativeAngle(Math.PI)).toBe(180 * 16)
    expect(toNativeAngle((3 * Math.PI) / 2)).toBe(270 * 16)
  })

  it('should round to the nearest native unit', () => {
    // 1 degree = 16 units, 1.01 degrees = 16.16 units
    expect(toNativeAngle((1.01 * Math.PI) / 180)).toBe(16)
  })
})

describe('toNativeArc', () => {
  it('should negate the sweep', () => {
    expect(toNativeArc(Math.PI, (3 * Math.PI) / 2)).toEqual({ start: 180 * 16, sweep: -90 * 16 })
  })

  it('should not produce negative zero', () => {
    const arc = toNativeArc(1, 1)
    expect(Object.is(arc.sweep, 0)).toBe(true)
  })
})

describe('nativeToRadians', () => {
  it('should invert toNativeAngle at quarter turns', () => {
    expect(nativeToRadians(1440)).toBeCloseTo(Math.PI / 2)
    expect(nativeToRadians(-2880)).toBeCloseTo(-Math.PI)
  })
})
