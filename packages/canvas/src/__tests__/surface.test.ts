/**
 * Render Surface Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from '@sketchloop/system'
import { ColourParseError, createImageCache, createRenderSurface } from '@sketchloop/canvas'
import type { DrawHandler, DrawRecorder } from '@sketchloop/canvas'
import { createTestPng } from './testImages'
import { createSpyPainter } from './testPainter'

const createTestSurface = () => {
  const requestRepaint = vi.fn()
  const surface = createRenderSurface({
    width: 300,
    height: 200,
    background: 'Black',
    tickIntervalMs: 17,
    images: { isSourceInBounds: () => false, prepareView: () => null },
    requestRepaint,
  })
  return { surface, requestRepaint }
}

describe('createRenderSurface', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe('diff suppression', () => {
    it('should repaint once for an unchanging frame', () => {
      const { surface, requestRepaint } = createTestSurface()
      const draw = vi.fn<DrawHandler>((canvas) => {
        canvas.drawCircle([150, 100], 99, 2, 'Green', 'Purple')
      })

      surface.setDrawHandler(draw)
      surface.start()
      vi.advanceTimersByTime(17 * 5)

      expect(draw).toHaveBeenCalledTimes(5)
      expect(requestRepaint).toHaveBeenCalledTimes(1)

      surface.stop()
    })

    it('should repaint on every tick whose frame differs', () => {
      const { surface, requestRepaint } = createTestSurface()
      let x = 0

      surface.setDrawHandler((canvas) => {
        x += 1
        canvas.drawPoint([x, 10], 'White')
      })
      surface.start()
      vi.advanceTimersByTime(17 * 3)

      expect(requestRepaint).toHaveBeenCalledTimes(3)
      expect(surface.getFrameBuffer()).toEqual([{ kind: 'point', point: [3, 10], colour: 'White' }])

      surface.stop()
    })

    it('should not repaint for an empty frame', () => {
      const { surface, requestRepaint } = createTestSurface()

      surface.setDrawHandler(() => {})
      surface.start()
      vi.advanceTimersByTime(17 * 3)

      expect(requestRepaint).not.toHaveBeenCalled()

      surface.stop()
    })
  })

  describe('scheduling', () => {
    it('should not draw before start', () => {
      const { surface } = createTestSurface()
      const draw = vi.fn()

      surface.setDrawHandler(draw)
      vi.advanceTimersByTime(100)

      expect(draw).not.toHaveBeenCalled()
      expect(surface.isTicking()).toBe(false)
    })

    it('should reschedule the tick when the handler is replaced', () => {
      const { surface } = createTestSurface()
      const first = vi.fn()
      const second = vi.fn()

      surface.setDrawHandler(first)
      surface.start()
      vi.advanceTimersByTime(10)
      surface.setDrawHandler(second)
      vi.advanceTimersByTime(10)

      expect(first).not.toHaveBeenCalled()
      expect(second).not.toHaveBeenCalled()

      vi.advanceTimersByTime(7)

      expect(first).not.toHaveBeenCalled()
      expect(second).toHaveBeenCalledTimes(1)

      surface.stop()
    })

    it('should stop ticking after stop', () => {
      const { surface } = createTestSurface()
      const draw = vi.fn()

      surface.setDrawHandler(draw)
      surface.start()
      vi.advanceTimersByTime(17)
      surface.stop()
      vi.advanceTimersByTime(170)

      expect(draw).toHaveBeenCalledTimes(1)
    })
  })

  describe('failures', () => {
    it('should let draw handler exceptions escape the tick', () => {
      const { surface, requestRepaint } = createTestSurface()
      surface.setDrawHandler(() => {
        throw new Error('user draw failed')
      })

      expect(() => surface.tick()).toThrow('user draw failed')
      expect(requestRepaint).not.toHaveBeenCalled()
    })

    it('should keep the previous frame when a handler throws midway', () => {
      const { surface } = createTestSurface()
      let fail = false
      surface.setDrawHandler((canvas) => {
        canvas.drawPoint([1, 1], 'Red')
        if (fail) throw new Error('user draw failed')
      })

      surface.tick()
      fail = true

      expect(() => surface.tick()).toThrow('user draw failed')
      expect(surface.getFrameBuffer()).toEqual([{ kind: 'point', point: [1, 1], colour: 'Red' }])
    })

    it('should surface an argument error raised inside the handler', () => {
      const { surface } = createTestSurface()
      surface.setDrawHandler((canvas) => {
        canvas.drawPolyline([], 1, 'Red')
      })

      expect(() => surface.tick()).toThrow('invalid point list: expected at least one point')
    })
  })

  describe('recording window', () => {
    it('should drop draw calls made through a kept canvas outside a tick', () => {
      const { surface, requestRepaint } = createTestSurface()
      const kept: Array<DrawRecorder> = []
      surface.setDrawHandler((canvas) => {
        kept.push(canvas)
        canvas.drawCircle([150, 100], 99, 2, 'Green', 'Purple')
      })
      surface.start()
      vi.advanceTimersByTime(17)

      kept[0]?.drawLine([0, 0], [10, 10], 1, 'Red')

      expect(surface.getFrameBuffer()).toHaveLength(1)
      vi.advanceTimersByTime(17 * 3)
      expect(requestRepaint).toHaveBeenCalledTimes(1)

      surface.stop()
    })

    it('should close the recording when the handler throws', () => {
      const { surface } = createTestSurface()
      const kept: Array<DrawRecorder> = []
      surface.setDrawHandler((canvas) => {
        kept.push(canvas)
        throw new Error('user draw failed')
      })

      expect(() => surface.tick()).toThrow('user draw failed')
      kept[0]?.drawPoint([1, 1], 'Red')

      expect(surface.getFrameBuffer()).toEqual([])
    })
  })

  describe('image readiness', () => {
    it('should repaint once when an image becomes ready between ticks', async () => {
      vi.useRealTimers()
      let release: (bytes: Uint8Array) => void = () => {}
      const pending = new Promise<Uint8Array>((resolve) => {
        release = resolve
      })
      const images = createImageCache({
        fetchBytes: () => pending,
        log: createLogger('Images', 'silent'),
      })
      const requestRepaint = vi.fn()
      const surface = createRenderSurface({
        width: 300,
        height: 200,
        background: 'Black',
        tickIntervalMs: 17,
        images,
        requestRepaint,
      })
      const handle = images.load('sprite.png')
      surface.setDrawHandler((canvas) => {
        canvas.drawImage(handle, [2, 1], [4, 2], [50, 50], [8, 4])
      })

      surface.tick()
      surface.tick()
      expect(requestRepaint).not.toHaveBeenCalled()

      release(createTestPng())
      await handle.whenSettled()
      surface.tick()
      surface.tick()
      surface.tick()

      expect(handle.state).toBe('ready')
      expect(requestRepaint).toHaveBeenCalledTimes(1)
      expect(surface.getFrameBuffer()).toHaveLength(1)
    })
  })

  describe('background', () => {
    it('should repaint only when the background changes', () => {
      const { surface, requestRepaint } = createTestSurface()

      surface.setBackground('Black')
      expect(requestRepaint).not.toHaveBeenCalled()

      surface.setBackground('White')
      expect(requestRepaint).toHaveBeenCalledTimes(1)
      expect(surface.getBackground()).toBe('White')
    })

    it('should reject an invalid background colour', () => {
      const { surface } = createTestSurface()

      expect(() => surface.setBackground('nope')).toThrow(ColourParseError)
      expect(surface.getBackground()).toBe('Black')
    })
  })

  describe('paint', () => {
    it('should fill the background and paint primitives in order', () => {
      const { surface } = createTestSurface()
      const painter = createSpyPainter()
      surface.setDrawHandler((canvas) => {
        canvas.drawCircle([150, 100], 99, 2, 'Green', 'Purple')
        canvas.drawArc([105, 94.2], 20, Math.PI, 1.5 * Math.PI, 1, 'Red', 'Blue')
      })

      surface.tick()
      surface.paint(painter)

      expect(painter.fillBackground).toHaveBeenCalledWith('rgb(0,0,0)', 300, 200)
      expect(painter.drawEllipse).toHaveBeenCalledWith(
        51,
        1,
        198,
        198,
        { colour: 'rgb(0,128,0)', width: 2 },
        'rgb(128,0,128)',
      )
      expect(painter.drawPie).toHaveBeenCalledWith(
        85,
        74,
        40,
        40,
        2880,
        -1440,
        { colour: 'rgb(255,0,0)', width: 1 },
        'rgb(0,0,255)',
      )
      expect(painter.drawEllipse.mock.invocationCallOrder[0]).toBeLessThan(
        painter.drawPie.mock.invocationCallOrder[0] ?? 0,
      )
    })
  })
})
