/**
 * Canvas Painter
 *
 * NativePainter on an @napi-rs/canvas 2D context.
 */

import type { Canvas, SKRSContext2D } from '@napi-rs/canvas'
import { nativeToRadians } from './angles'
import { toCssFont } from './fonts'
import type { NativePainter, Pen } from './painter'
import type { Point } from './vocabulary'

export function createCanvasPainter(ctx: SKRSContext2D): NativePainter {
  const withState = (draw: () => void) => {
    ctx.save()
    try {
      draw()
    } finally {
      ctx.restore()
    }
  }

  const applyPen = (pen: Pen) => {
    ctx.strokeStyle = pen.colour
    ctx.lineWidth = pen.width
  }

  const tracePoints = (points: ReadonlyArray<Point>) => {
    ctx.beginPath()
    points.forEach(([x, y], index) => {
      if (index === 0) ctx.moveTo(x, y)
      else ctx.lineTo(x, y)
    })
  }

  // Native angles run counter-clockwise, canvas angles clockwise
  const traceArc = (x: number, y: number, w: number, h: number, start: number, sweep: number) => {
    const startRadians = -nativeToRadians(start)
    const endRadians = -nativeToRadians(start + sweep)
    ctx.ellipse(x + w / 2, y + h / 2, w / 2, h / 2, 0, startRadians, endRadians, sweep > 0)
  }

  return {
    fillBackground(colour, width, height) {
      withState(() => {
        ctx.fillStyle = colour
        ctx.fillRect(0, 0, width, height)
      })
    },

    drawLine(x1, y1, x2, y2, pen) {
      withState(() => {
        applyPen(pen)
        ctx.beginPath()
        ctx.moveTo(x1, y1)
        ctx.lineTo(x2, y2)
        ctx.stroke()
      })
    },

    drawPolyline(points, pen) {
      withState(() => {
        applyPen(pen)
        tracePoints(points)
        ctx.stroke()
      })
    },

    drawPolygon(points, pen, fill) {
      withState(() => {
        applyPen(pen)
        tracePoints(points)
        ctx.closePath()
        if (fill !== null) {
          ctx.fillStyle = fill
          ctx.fill()
        }
        ctx.stroke()
      })
    },

    drawEllipse(x, y, w, h, pen, fill) {
      withState(() => {
        applyPen(pen)
        ctx.beginPath()
        ctx.ellipse(x + w / 2, y + h / 2, w / 2, h / 2, 0, 0, Math.PI * 2)
        if (fill !== null) {
          ctx.fillStyle = fill
          ctx.fill()
        }
        ctx.stroke()
      })
    },

    drawArc(x, y, w, h, start, sweep, pen) {
      withState(() => {
        applyPen(pen)
        ctx.beginPath()
        traceArc(x, y, w, h, start, sweep)
        ctx.stroke()
      })
    },

    drawPie(x, y, w, h, start, sweep, pen, fill) {
      withState(() => {
        applyPen(pen)
        ctx.beginPath()
        ctx.moveTo(x + w / 2, y + h / 2)
        traceArc(x, y, w, h, start, sweep)
        ctx.closePath()
        ctx.fillStyle = fill
        ctx.fill()
        ctx.stroke()
      })
    },

    drawPoint(x, y, colour) {
      withState(() => {
        ctx.fillStyle = colour
        ctx.fillRect(x, y, 1, 1)
      })
    },

    drawText(text, x, y, font, colour) {
      withState(() => {
        ctx.font = toCssFont(font.size, font.face)
        ctx.fillStyle = colour
        ctx.textBaseline = 'bottom'
        ctx.fillText(text, x, y)
      })
    },

    drawImage(view: Canvas, cx, cy) {
      ctx.drawImage(view, cx - view.width / 2, cy - view.height / 2)
    },
  }
}
