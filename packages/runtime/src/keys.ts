/**
 * Key codes
 *
 * Handlers receive integer key codes. KEY_MAP names the ones scripts can
 * rely on: letters (either case), digits, space and the arrows.
 */

import { ArgumentError } from '@sketchloop/system'

const buildKeyMap = () => {
  const map: Record<string, number> = {
    space: 32,
    left: 37,
    up: 38,
    right: 39,
    down: 40,
  }
  for (let code = 48; code <= 57; code++) {
    map[String.fromCharCode(code)] = code
  }
  for (let code = 65; code <= 90; code++) {
    map[String.fromCharCode(code)] = code
    map[String.fromCharCode(code + 32)] = code
  }
  return map
}

export const KEY_MAP: Readonly<Record<string, number>> = Object.freeze(buildKeyMap())

// First name wins, so 65 reads back as 'A'
const KEY_NAMES = new Map<number, string>()
for (const [name, code] of Object.entries(KEY_MAP)) {
  if (!KEY_NAMES.has(code)) KEY_NAMES.set(code, name)
}

export function keyCode(name: string): number {
  if (!Object.hasOwn(KEY_MAP, name)) {
    throw new ArgumentError(`key ${name} is not a valid keyboard symbol`)
  }
  return KEY_MAP[name] ?? 0
}

/**
 * Display name for a key code, or the code itself for unnamed keys
 */
export function keyName(code: number): string {
  return KEY_NAMES.get(code) ?? String(code)
}
