// Core types - shared across all packages
export * from './types'

// Image store interface - implemented by @image-sync/glance
export * from './store'

// Domain errors
export * from './errors'

// Schemas for validation
export * from './schemas/image'
export * from './schemas/config'

// Case conversion utilities (snake_case ↔ camelCase)
export * from './case-convert'
