/**
 * Runtime Configuration
 *
 * Every knob has a default, so `createRuntimeConfig()` is a complete config.
 */

import { isColour } from '@sketchloop/canvas'
import { validate } from '@sketchloop/system'
import { z } from 'zod'

export const runtimeConfigSchema = z.object({
  /**
   * Render tick interval
   */
  tickIntervalMs: z.number().positive().default(17),

  /**
   * Delay of the deferred exit check after a resource is released
   */
  quiescenceDelayMs: z.number().nonnegative().default(10),

  /**
   * Delay between the end of setup and the lifecycle starting
   */
  startDelayMs: z.number().nonnegative().default(0),

  background: z
    .string()
    .refine(isColour, { message: 'expected a colour' })
    .default('Black'),

  controlWidth: z.number().int().positive().default(200),

  logging: z.enum(['info', 'silent']).default('info'),
})

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>

export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>

export function createRuntimeConfig(overrides: RuntimeConfigInput = {}): RuntimeConfig {
  return validate(runtimeConfigSchema, overrides, 'runtime config')
}
