/**
 * Sounds
 *
 * A sound is tracked while it loads and while it plays, so a script that
 * only plays a sound runs until the sound ends. Load failures are logged
 * and leave the sound silent.
 *
 * `play()` before the load finishes is remembered and honoured on load.
 */

import { canvasKeywords } from '@sketchloop/canvas'
import type { AssetState } from '@sketchloop/canvas'
import { validate } from '@sketchloop/system'
import { z } from 'zod'
import type { AudioClip, Playback } from './audio'
import type { RuntimeContext } from './context'
import { runtimeKeywords } from './vocabulary'

export type Sound = {
  readonly url: string
  getState: () => AssetState
  /**
   * Start, or resume from the paused position
   */
  play: () => void
  /**
   * Stop and keep the position
   */
  pause: () => void
  /**
   * Stop and return to the start
   */
  rewind: () => void
  /**
   * 0 (silent) to 1 (full)
   */
  setVolume: (volume: number) => void
  getVolume: () => number
  isPlaying: () => boolean
  whenSettled: () => Promise<void>
}

const volumeSchema = z.number().min(0).max(1)

export function loadSound(context: RuntimeContext, url: string): Sound {
  const { tracker, audio, fetchBytes } = context
  const log = context.createLog('Sound')

  let state: AssetState = canvasKeywords.assetStates.loading
  let clip: AudioClip | null = null
  let playback: Playback | null = null
  let playRequested = false
  let position = 0
  let volume = 1

  // Halting the runtime stops the sound where it is, without untracking
  const release = () => {
    if (playback) position = playback.stop()
    playback = null
    playRequested = false
  }

  const startPlayback = (loaded: AudioClip) => {
    playback = audio.play(loaded, position, volume, () => {
      playback = null
      position = 0
      playRequested = false
      tracker.untrack(sound)
    })
    tracker.track(sound, runtimeKeywords.resourceKinds.sound, release)
  }

  const sound: Sound = {
    url,
    getState: () => state,

    play: () => {
      if (clip && !playback) startPlayback(clip)
      playRequested = true
    },

    pause: () => {
      if (clip) {
        if (playback) position = playback.stop()
        playback = null
        tracker.untrack(sound)
      }
      playRequested = false
    },

    rewind: () => {
      if (clip) {
        playback?.stop()
        playback = null
        position = 0
        tracker.untrack(sound)
      }
      playRequested = false
    },

    setVolume: (next) => {
      volume = validate(volumeSchema, next, 'volume')
      playback?.setVolume(volume)
    },

    getVolume: () => volume,
    isPlaying: () => playback !== null,
    whenSettled: () => settled,
  }

  tracker.track(sound, runtimeKeywords.resourceKinds.sound, release)

  const onLoaded = (loaded: AudioClip) => {
    clip = loaded
    state = canvasKeywords.assetStates.ready
    if (playRequested) {
      startPlayback(loaded)
      return
    }
    tracker.untrack(sound)
  }

  const onFailed = (error: unknown) => {
    state = canvasKeywords.assetStates.failed
    playRequested = false
    log.warn(`Failed to load sound ${url}:`, error instanceof Error ? error.message : error)
    tracker.untrack(sound)
  }

  const settled = Promise.resolve()
    .then(() => fetchBytes(url))
    .then((bytes) => audio.decode(bytes))
    .then(onLoaded, onFailed)

  return sound
}
