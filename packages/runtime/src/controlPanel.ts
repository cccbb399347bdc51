/**
 * Control Panel
 *
 * Headless model of the column of controls beside the canvas: labels,
 * buttons and text inputs in insertion order, followed by two status lines
 * showing the last key and mouse event.
 */

import type { MousePosition } from '@sketchloop/canvas'
import { validate } from '@sketchloop/system'
import { z } from 'zod'
import { keyName } from './keys'

export type ControlKind = 'label' | 'button' | 'input'

export type Control = {
  readonly kind: ControlKind
  getText: () => string
  setText: (text: string) => void
  /**
   * Width in pixels, null when it fits its text
   */
  readonly width: number | null
}

export type ButtonControl = Control & {
  /**
   * Invoke the button handler, as a user click would
   */
  click: () => void
}

export type InputControl = Control & {
  /**
   * Send the current text to the input handler, as Enter would
   */
  submit: () => void
  getLabel: () => string
}

const widthSchema = z.number().int().positive()

const optionalWidth = (width: number | undefined) =>
  width === undefined ? null : validate(widthSchema, width, 'control width')

const createTextControl = (kind: ControlKind, initial: string, width: number | null): Control => {
  let text = initial
  return {
    kind,
    width,
    getText: () => text,
    setText: (next) => {
      text = String(next)
    },
  }
}

export function createControlPanel(width: number) {
  const controls: Array<Control> = []
  let keyStatus = 'Key: '
  let mouseStatus = 'Mouse: '

  return {
    width,

    addLabel(text: string, labelWidth?: number): Control {
      const label = createTextControl('label', text, optionalWidth(labelWidth))
      controls.push(label)
      return label
    },

    addButton(text: string, handler: () => void, buttonWidth?: number): ButtonControl {
      const button = {
        ...createTextControl('button', text, optionalWidth(buttonWidth)),
        click: () => handler(),
      }
      controls.push(button)
      return button
    },

    /**
     * The input field starts empty; `label` is shown above it
     */
    addInput(label: string, handler: (text: string) => void, inputWidth: number): InputControl {
      const field = createTextControl('input', '', validate(widthSchema, inputWidth, 'input width'))
      const input = {
        ...field,
        getLabel: () => label,
        submit: () => handler(field.getText()),
      }
      controls.push(input)
      return input
    },

    getControls: (): ReadonlyArray<Control> => controls,

    // Status handlers, registered as the secondary input handlers
    onKeydown: (key: number) => {
      keyStatus = `Key: Down ${keyName(key)}`
    },
    onKeyup: (key: number) => {
      keyStatus = `Key: Up ${keyName(key)}`
    },
    onMouseclick: ([x, y]: MousePosition) => {
      mouseStatus = `Mouse: Click ${x}, ${y}`
    },
    onMousedrag: ([x, y]: MousePosition) => {
      mouseStatus = `Mouse: Move - ${x}, ${y}`
    },

    getKeyStatus: () => keyStatus,
    getMouseStatus: () => mouseStatus,
  }
}

export type ControlPanel = ReturnType<typeof createControlPanel>
