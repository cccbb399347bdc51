import { describe, expect, it } from 'vitest'
import { ArgumentError } from '@sketchloop/system'
import { createRuntimeConfig } from '@sketchloop/runtime'

describe('createRuntimeConfig', () => {
  it('should fill in every default', () => {
    expect(createRuntimeConfig()).toEqual({
      tickIntervalMs: 17,
      quiescenceDelayMs: 10,
      startDelayMs: 0,
      background: 'Black',
      controlWidth: 200,
      logging: 'info',
    })
  })

  it('should keep overrides', () => {
    const config = createRuntimeConfig({ tickIntervalMs: 33, background: 'aqua', logging: 'silent' })

    expect(config.tickIntervalMs).toBe(33)
    expect(config.background).toBe('aqua')
    expect(config.logging).toBe('silent')
  })

  it('should reject a non-positive tick interval', () => {
    expect(() => createRuntimeConfig({ tickIntervalMs: 0 })).toThrow(ArgumentError)
    expect(() => createRuntimeConfig({ tickIntervalMs: -1 })).toThrow(
      /^invalid runtime config at \[tickIntervalMs\]: /,
    )
  })

  it('should reject a background that is not a colour', () => {
    expect(() => createRuntimeConfig({ background: 'nope' })).toThrow(
      'invalid runtime config at [background]: expected a colour',
    )
  })
})
