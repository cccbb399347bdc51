import { createRuntimeConfig, startRuntimeContext } from '@sketchloop/runtime'
import type { RuntimeConfigInput, RuntimeServices } from '@sketchloop/runtime'

/**
 * Silent runtime context with injectable services
 */
export const createTestContext = (
  overrides: RuntimeConfigInput = {},
  services: RuntimeServices = {},
) => startRuntimeContext(createRuntimeConfig({ logging: 'silent', ...overrides }), services)

/**
 * Minimal PCM WAV: mono, 8-bit, `byteRate` bytes per second
 */
export const createWav = (dataBytes: number, byteRate = 8000) => {
  const bytes = new Uint8Array(44 + dataBytes)
  const view = new DataView(bytes.buffer)
  const write = (offset: number, text: string) => {
    for (let i = 0; i < text.length; i++) bytes[offset + i] = text.charCodeAt(i)
  }

  write(0, 'RIFF')
  view.setUint32(4, 36 + dataBytes, true)
  write(8, 'WAVE')
  write(12, 'fmt ')
  view.setUint32(16, 16, true)
  view.setUint16(20, 1, true)
  view.setUint16(22, 1, true)
  view.setUint32(24, byteRate, true)
  view.setUint32(28, byteRate, true)
  view.setUint16(32, 1, true)
  view.setUint16(34, 8, true)
  write(36, 'data')
  view.setUint32(40, dataBytes, true)
  return bytes
}
