/**
 * @sketchloop/canvas
 *
 * Drawing and input for a single canvas: primitives recorded per tick,
 * structural diffing, image assets, colours, fonts, and the painter that
 * renders a stored frame onto an @napi-rs/canvas context.
 */

// Vocabulary
export * from './vocabulary'

// Primitives & recording
export * from './angles'
export * from './primitives'
export * from './recorder'

// Styling
export * from './colours'
export * from './fonts'

// Assets
export * from './images'

// Painting
export * from './painter'
export * from './canvasPainter'

// Input
export * from './router'

// Surface
export * from './surface'
