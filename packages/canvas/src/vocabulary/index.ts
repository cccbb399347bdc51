export * from './canvasKeywords'
export * from './canvasSchemas'
