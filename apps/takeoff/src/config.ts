import { API_PATHS, parsePositiveInt } from '@takeoff-link/shared'

export interface Env {
  PORT?: string
  // Where /trigger delivers change notifications
  ESTIMATOR_WEBHOOK_URL?: string
  ESTIMATOR_TIMEOUT_MS?: string
}

export interface TakeoffConfig {
  port: number
  estimatorWebhookUrl: string
  estimatorTimeoutMs: number
}

const DEFAULT_ESTIMATOR_WEBHOOK_URL = `http://localhost:8001${API_PATHS.conditionsChange}`
const DEFAULT_ESTIMATOR_TIMEOUT_MS = 10_000
const DEFAULT_PORT = 8000

export function loadConfig(env: Env): TakeoffConfig {
  return {
    port: parsePositiveInt('PORT', env.PORT, DEFAULT_PORT),
    estimatorWebhookUrl: env.ESTIMATOR_WEBHOOK_URL || DEFAULT_ESTIMATOR_WEBHOOK_URL,
    estimatorTimeoutMs: parsePositiveInt('ESTIMATOR_TIMEOUT_MS', env.ESTIMATOR_TIMEOUT_MS, DEFAULT_ESTIMATOR_TIMEOUT_MS),
  }
}
