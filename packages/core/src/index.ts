// Core types - shared across all packages
export * from './types'

// Runtime gateway interface - implemented by @berth/docker
export * from './gateway'

// Domain errors
export * from './errors'

// Schemas for validation
export * from './schemas/options'
export * from './schemas/container'

// Case conversion utilities (snake_case → camelCase)
export * from './case-convert'
