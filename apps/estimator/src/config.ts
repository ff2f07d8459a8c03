/**
 * Estimator configuration
 *
 * Reads the process environment into a typed config with defaults.
 */

import { readFileSync } from 'node:fs'
import { parsePositiveInt } from '@takeoff-link/shared'
import { DEFAULT_PRICING_TABLE, parsePricingTable } from './pricing'
import type { PricingTable } from './pricing'

export interface Env {
  // Takeoff service
  TAKEOFF_SERVICE_URL?: string
  TAKEOFF_TIMEOUT_MS?: string

  // HTTP server
  PORT?: string

  // Optional JSON file replacing the built-in pricing table
  PRICING_TABLE_FILE?: string
}

export interface EstimatorConfig {
  /** Base URL of the takeoff service, without trailing slash */
  takeoffServiceUrl: string
  takeoffTimeoutMs: number
  port: number
  pricingTableFile?: string
}

const DEFAULT_TAKEOFF_SERVICE_URL = 'http://localhost:8000'
const DEFAULT_TAKEOFF_TIMEOUT_MS = 30_000
const DEFAULT_PORT = 8001

export function loadConfig(env: Env): EstimatorConfig {
  return {
    takeoffServiceUrl: (env.TAKEOFF_SERVICE_URL || DEFAULT_TAKEOFF_SERVICE_URL).replace(/\/+$/, ''),
    takeoffTimeoutMs: parsePositiveInt('TAKEOFF_TIMEOUT_MS', env.TAKEOFF_TIMEOUT_MS, DEFAULT_TAKEOFF_TIMEOUT_MS),
    port: parsePositiveInt('PORT', env.PORT, DEFAULT_PORT),
    pricingTableFile: env.PRICING_TABLE_FILE || undefined,
  }
}

/**
 * Load the pricing table named in config, or the built-in one
 */
export function loadPricingTable(config: EstimatorConfig): PricingTable {
  if (!config.pricingTableFile) return DEFAULT_PRICING_TABLE

  const raw: unknown = JSON.parse(readFileSync(config.pricingTableFile, 'utf8'))
  console.log(`[Config] Loaded pricing table from ${config.pricingTableFile}`)
  return parsePricingTable(raw)
}
