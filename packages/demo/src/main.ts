/**
 * Welcome sketch
 *
 * A frame with one of every primitive, a button cycling the text font, a
 * label fed by an input, and a timer that restarts itself every tenth call
 * and stops for good on the thirtieth. When the timer stops the canvas is
 * written to welcome.png and the frame closes, so the process exits.
 *
 * Run: npm run demo
 */

import { writeFile } from 'node:fs/promises'
import { createRuntime } from '@sketchloop/runtime'
import type { Timer } from '@sketchloop/runtime'

const faces = ['serif', 'sans-serif', 'monospace'] as const

const runtime = await createRuntime()
const log = runtime.context.createLog('Demo')

let message = 'Welcome!'
let faceIndex = 0
let calls = 0

const done = runtime.run(({ createFrame, createTimer }) => {
  const frame = createFrame('Home', 300, 200)
  frame.setCanvasBackground('aqua')

  frame.setDrawHandler((canvas) => {
    canvas.drawCircle([150, 100], 99, 2, 'green', 'purple')
    canvas.drawLine([100, 0], [100, 199], 3, 'red')
    canvas.drawPoint([150, 100], 'yellow')
    canvas.drawPoint([0, 0], 'red')
    canvas.drawPoint([299, 199], 'red')
    canvas.drawPoint([299, 0], 'red')
    canvas.drawPoint([0, 199], 'red')
    canvas.drawPolyline([[0, 199], [150, 100], [150, 150]], 2, 'green')
    canvas.drawPolygon([[0, 100], [150, 50], [0, 50]], 2, 'green', 'blue')
    canvas.drawArc([150, 100], 50, 0, Math.PI / 2, 2, 'orange')
    canvas.drawText(message, [0, 199], 48, 'Red', faces[faceIndex])
  })

  frame.addButton('Click me', () => {
    message = 'Good job!'
    faceIndex = (faceIndex + 1) % faces.length
  })
  const label = frame.addLabel('lAB1', 120)
  frame.addInput('INPgUT', label.setText, 300)

  const timer: Timer = createTimer(100, () => {
    calls++
    if (calls % 10 !== 0) return

    timer.stop()
    timer.start()
    log.info(`Restarted after ${calls} calls`)

    if (calls % 30 === 0) {
      timer.stop()
      writeFile('welcome.png', frame.snapshot())
        .then(() => log.info('Wrote welcome.png'))
        .catch((error: unknown) => log.error('Failed to write snapshot:', error))
        .finally(() => frame.close())
    }
  })

  frame.start()
  timer.start()
})

await done
log.info('Done')
