import { describe, expect, it } from 'vitest'
import { frameBuffersEqual, primitivesEqual } from '@sketchloop/canvas'
import type { DrawPrimitive, ImageHandle } from '@sketchloop/canvas'

const polyline = (points: Array<[number, number]>): DrawPrimitive => ({
  kind: 'polyline',
  points,
  lineWidth: 1,
  colour: 'Red',
})

const handle = (url: string): ImageHandle => ({
  url,
  state: 'ready',
  getWidth: () => 4,
  getHeight: () => 4,
  isReady: () => true,
  whenSettled: () => Promise.resolve(),
})

const image = (image: ImageHandle): DrawPrimitive => ({
  kind: 'image',
  image,
  sourceCenter: [2, 2],
  sourceSize: [4, 4],
  destCenter: [10, 10],
  destSize: [4, 4],
  rotation: 0,
})

describe('primitivesEqual', () => {
  it('should compare point lists element-wise', () => {
    expect(primitivesEqual(polyline([[1, 2], [3, 4]]), polyline([[1, 2], [3, 4]]))).toBe(true)
    expect(primitivesEqual(polyline([[1, 2], [3, 4]]), polyline([[1, 2], [3, 5]]))).toBe(false)
    expect(primitivesEqual(polyline([[1, 2]]), polyline([[1, 2], [1, 2]]))).toBe(false)
  })

  it('should distinguish kinds with the same geometry', () => {
    const point: DrawPrimitive = { kind: 'point', point: [1, 2], colour: 'Red' }
    const text: DrawPrimitive = {
      kind: 'text',
      text: 'x',
      point: [1, 2],
      fontSize: 12,
      colour: 'Red',
      face: 'serif',
    }
    expect(primitivesEqual(point, text)).toBe(false)
  })

  it('should compare colours by the string given', () => {
    const red: DrawPrimitive = { kind: 'point', point: [1, 2], colour: 'Red' }
    const lowerRed: DrawPrimitive = { kind: 'point', point: [1, 2], colour: 'red' }
    expect(primitivesEqual(red, lowerRed)).toBe(false)
  })

  it('should compare images by handle identity', () => {
    const first = handle('a.png')
    expect(primitivesEqual(image(first), image(first))).toBe(true)
    expect(primitivesEqual(image(first), image(handle('a.png')))).toBe(false)
  })
})

describe('frameBuffersEqual', () => {
  it('should treat two empty buffers as equal', () => {
    expect(frameBuffersEqual([], [])).toBe(true)
  })

  it('should be order sensitive', () => {
    const a: DrawPrimitive = { kind: 'point', point: [1, 1], colour: 'Red' }
    const b: DrawPrimitive = { kind: 'point', point: [2, 2], colour: 'Red' }
    expect(frameBuffersEqual([a, b], [a, b])).toBe(true)
    expect(frameBuffersEqual([a, b], [b, a])).toBe(false)
  })
})
