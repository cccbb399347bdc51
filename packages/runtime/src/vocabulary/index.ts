export * from './runtimeKeywords'
