/**
 * @sketchloop/runtime
 *
 * Runs scripts written against the frame/timer/image/sound API headlessly
 * on Node, for as long as they have something live.
 *
 * ## Modules
 *
 * ### Runtime
 * createRuntime(), run(setup) and halt(), the entry point for scripts.
 *
 * ### Context
 * Configuration, logging, resource tracker, lifecycle and shared services,
 * passed to every component. The services are braided resources.
 *
 * ### Frames, Timers, Sounds
 * The objects scripts create; each registers with the tracker or lifecycle
 * while it is live.
 */

// ============================================================================
// Vocabulary & Configuration
// ============================================================================

export * from './vocabulary'
export * from './config'

// ============================================================================
// Context & Lifecycle
// ============================================================================

export * from './tracker'
export * from './lifecycle'
export * from './context'

// ============================================================================
// Script Objects
// ============================================================================

export * from './audio'
export * from './sound'
export * from './timer'
export * from './controlPanel'
export * from './frame'
export * from './keys'

// ============================================================================
// Public API
// ============================================================================

export * from './runtime'
