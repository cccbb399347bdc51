/**
 * Runtime Context
 *
 * The one object every component receives at construction: configuration,
 * logging, the resource tracker, the lifecycle and the shared asset and
 * audio services. Nothing reaches these through module state.
 *
 * The services are braided resources, started in dependency order and
 * halted in reverse:
 *
 *   tracker (no deps)
 *       ↓
 *   lifecycle ← tracker
 *
 *   images (no deps)
 *   audio (no deps)
 */

import { defineResource, haltSystem, startSystem } from 'braided'
import type { StartedResource, StartedSystem } from 'braided'
import { createImageCache } from '@sketchloop/canvas'
import type { DecodeImage, ImageCache, ImageCacheOptions } from '@sketchloop/canvas'
import { createLogger, fetchBytes as fetchFromSource } from '@sketchloop/system'
import type { FetchBytes, Logger } from '@sketchloop/system'
import { createAudioResource } from './audio'
import type { AudioOutput } from './audio'
import type { RuntimeConfig } from './config'
import { createLifecycleResource } from './lifecycle'
import type { Lifecycle } from './lifecycle'
import { trackerResource } from './tracker'
import type { ResourceTracker } from './tracker'

export type RuntimeServices = {
  fetchBytes?: FetchBytes
  audio?: AudioOutput
  decodeImage?: DecodeImage
}

export type RuntimeContext = {
  config: RuntimeConfig
  log: Logger
  createLog: (scope: string) => Logger
  tracker: ResourceTracker
  lifecycle: Lifecycle
  images: ImageCache
  audio: AudioOutput
  fetchBytes: FetchBytes
  /**
   * Halt every service: live timers and sounds stop, open frames close.
   * Later calls resolve without doing anything.
   */
  halt: () => Promise<void>
}

// ============================================================================
// Resources
// ============================================================================

export const createImageCacheResource = (options: ImageCacheOptions) =>
  defineResource({
    dependencies: [],
    start: () => createImageCache(options),
    halt: (images) => {
      images.clearViews()
    },
  })

export type ImageCacheResource = StartedResource<ReturnType<typeof createImageCacheResource>>

// ============================================================================
// System
// ============================================================================

export const createRuntimeSystemConfig = (
  config: RuntimeConfig,
  services: RuntimeServices,
  fetchBytes: FetchBytes,
) => {
  const createLog = (scope: string) => createLogger(scope, config.logging)
  return {
    tracker: trackerResource,
    lifecycle: createLifecycleResource({
      quiescenceDelayMs: config.quiescenceDelayMs,
      log: createLog('Lifecycle'),
    }),
    images: createImageCacheResource({
      fetchBytes,
      log: createLog('Images'),
      decode: services.decodeImage,
    }),
    audio: createAudioResource(services.audio),
  }
}

export type RuntimeSystem = StartedSystem<ReturnType<typeof createRuntimeSystemConfig>>

/**
 * Start the runtime's services and assemble the context around them
 */
export async function startRuntimeContext(
  config: RuntimeConfig,
  services: RuntimeServices = {},
): Promise<RuntimeContext> {
  const createLog = (scope: string) => createLogger(scope, config.logging)
  const log = createLog('Runtime')
  const fetchBytes = services.fetchBytes ?? fetchFromSource
  const systemConfig = createRuntimeSystemConfig(config, services, fetchBytes)

  const { system, errors } = await startSystem(systemConfig)
  if (errors.size > 0) {
    const detail = Array.from(errors.entries())
      .map(([name, error]) => `${name}: ${error.message}`)
      .join(', ')
    throw new Error(`[Runtime] System start failed: ${detail}`)
  }

  let halted = false

  return {
    config,
    log,
    createLog,
    tracker: system.tracker,
    lifecycle: system.lifecycle,
    images: system.images,
    audio: system.audio,
    fetchBytes,
    halt: async () => {
      if (halted) return
      halted = true
      log.info('Halting...')
      await haltSystem(systemConfig, system)
    },
  }
}
