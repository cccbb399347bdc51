/**
 * Audio Output
 *
 * Sounds decode and play through an AudioOutput. The default one is
 * headless: it recognizes the container, works out a duration and "plays"
 * by waiting that long, so sounds keep the runtime alive exactly as long
 * as they would on a speaker.
 */

import { defineResource } from 'braided'
import type { StartedResource } from 'braided'
import { runtimeKeywords } from './vocabulary'
import type { AudioFormat } from './vocabulary'

// ============================================================================
// Types
// ============================================================================

export type AudioClip = {
  format: AudioFormat
  durationMs: number
}

export type Playback = {
  /**
   * Stop playing and return the position reached, in ms
   */
  stop: () => number
  setVolume: (volume: number) => void
}

export interface AudioOutput {
  /**
   * Throws for bytes that are not a supported sound
   */
  decode: (bytes: Uint8Array) => AudioClip
  /**
   * Play from `fromMs`; `onEnded` fires once if the clip reaches its end
   */
  play: (clip: AudioClip, fromMs: number, volume: number, onEnded: () => void) => Playback
  /**
   * Stop every playback without firing `onEnded`
   */
  close: () => void
}

// ============================================================================
// Container sniffing
// ============================================================================

// Used where the container has no cheap exact duration
const ASSUMED_BITRATE_BPS = 128_000

const ascii = (bytes: Uint8Array, offset: number, length: number) =>
  String.fromCharCode(...bytes.subarray(offset, offset + length))

const isMp3FrameSync = (bytes: Uint8Array) =>
  bytes.length >= 2 && bytes[0] === 0xff && ((bytes[1] ?? 0) & 0xe0) === 0xe0

export function detectAudioFormat(bytes: Uint8Array): AudioFormat | null {
  if (bytes.length >= 12 && ascii(bytes, 0, 4) === 'RIFF' && ascii(bytes, 8, 4) === 'WAVE') {
    return runtimeKeywords.audioFormats.wav
  }
  if (ascii(bytes, 0, 3) === 'ID3' || isMp3FrameSync(bytes)) {
    return runtimeKeywords.audioFormats.mp3
  }
  if (ascii(bytes, 0, 4) === 'OggS') {
    return runtimeKeywords.audioFormats.ogg
  }
  return null
}

/**
 * Duration from the fmt byte rate and data chunk size, or null when the
 * chunks are missing
 */
export function wavDurationMs(bytes: Uint8Array): number | null {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let byteRate: number | null = null
  let offset = 12

  while (offset + 8 <= bytes.length) {
    const id = ascii(bytes, offset, 4)
    const size = view.getUint32(offset + 4, true)
    const body = offset + 8

    if (id === 'fmt ' && body + 12 <= bytes.length) {
      byteRate = view.getUint32(body + 8, true)
    } else if (id === 'data') {
      if (!byteRate) return null
      const dataSize = Math.min(size, bytes.length - body)
      return (dataSize / byteRate) * 1000
    }

    // Chunks are padded to even sizes
    offset = body + size + (size % 2)
  }
  return null
}

// ============================================================================
// Headless Output
// ============================================================================

export function createHeadlessAudioOutput(): AudioOutput {
  const playing = new Set<ReturnType<typeof setTimeout>>()

  return {
    decode(bytes) {
      const format = detectAudioFormat(bytes)
      if (format === null) throw new Error('unsupported audio format')

      if (format === runtimeKeywords.audioFormats.wav) {
        const durationMs = wavDurationMs(bytes)
        if (durationMs === null) throw new Error('malformed WAV header')
        return { format, durationMs }
      }

      return { format, durationMs: ((bytes.length * 8) / ASSUMED_BITRATE_BPS) * 1000 }
    },

    play(clip, fromMs, _volume, onEnded) {
      const startedAt = Date.now()
      const remaining = Math.max(0, clip.durationMs - fromMs)
      const timeout = setTimeout(() => {
        playing.delete(timeout)
        onEnded()
      }, remaining)
      playing.add(timeout)

      return {
        stop: () => {
          clearTimeout(timeout)
          playing.delete(timeout)
          return Math.min(clip.durationMs, fromMs + (Date.now() - startedAt))
        },
        setVolume: () => {},
      }
    },

    close() {
      playing.forEach((timeout) => clearTimeout(timeout))
      playing.clear()
    },
  }
}

// ============================================================================
// Resource Definition
// ============================================================================

export const createAudioResource = (output?: AudioOutput) =>
  defineResource({
    dependencies: [],
    start: () => output ?? createHeadlessAudioOutput(),
    halt: (audio) => {
      audio.close()
    },
  })

export type AudioResource = StartedResource<ReturnType<typeof createAudioResource>>
