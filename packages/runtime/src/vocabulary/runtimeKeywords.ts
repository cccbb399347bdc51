/**
 * Runtime Keywords
 *
 * Canonical names for lifecycle states, tracked resource kinds and audio
 * formats.
 */

export const runtimeKeywords = {
  /**
   * Application lifecycle, in order. `exited` is terminal.
   */
  lifecycleStates: {
    notStarted: 'notStarted',
    running: 'running',
    exited: 'exited',
  },

  /**
   * Resources that keep the runtime alive while tracked
   */
  resourceKinds: {
    timer: 'timer',
    sound: 'sound',
    frame: 'frame',
  },

  /**
   * Audio containers the headless output recognizes
   */
  audioFormats: {
    wav: 'wav',
    mp3: 'mp3',
    ogg: 'ogg',
  },
} as const

export type LifecycleState =
  (typeof runtimeKeywords.lifecycleStates)[keyof typeof runtimeKeywords.lifecycleStates]

export type ResourceKind =
  (typeof runtimeKeywords.resourceKinds)[keyof typeof runtimeKeywords.resourceKinds]

export type AudioFormat =
  (typeof runtimeKeywords.audioFormats)[keyof typeof runtimeKeywords.audioFormats]
