// Shared model, API types and schemas for the takeoff and estimator services

// Re-export measurement model
export * from './takeoff.types'

// Re-export API types
export * from './api.types'

// Re-export runtime schemas
export * from './schemas'

// Re-export HTTP helpers
export * from './http'

// Re-export environment parsing
export * from './env'
