/**
 * @sketchloop/system
 *
 * Generic infrastructure shared by the canvas and runtime packages.
 * No drawing and no lifecycle policy lives here.
 *
 * ## Modules
 *
 * ### State
 * Subscriptions and atoms, mutated only from event loop callbacks.
 *
 * ### Event Bus
 * Typed fan-out keyed by an event map.
 *
 * ### Interval Loop
 * Fixed-cadence ticking over the host interval timer.
 *
 * ### Errors, Logging, Fetching
 * ArgumentError with zod-backed validation, prefixed console logging,
 * and byte fetching for paths and URLs.
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Event Bus
// ============================================================================

export * from './eventBus'

// ============================================================================
// Interval Loop
// ============================================================================

export * from './intervalLoop'

// ============================================================================
// Errors & Logging
// ============================================================================

export * from './errors'
export * from './logger'

// ============================================================================
// I/O
// ============================================================================

export * from './fetchBytes'
