/**
 * Estimator Service
 *
 * Receives change notifications from the takeoff service, fetches the
 * complete page state back and recalculates the cost estimate.
 */

import { API_PATHS, errorResponse, jsonResponse, methodNotAllowed } from '@takeoff-link/shared'
import type { FetchLike, HealthResponse } from '@takeoff-link/shared'
import type { EstimatorConfig } from './config'
import { handleConditionsChange } from './conditions-change'
import type { EstimateJobDeps } from './estimate-job'
import type { ExecutionContext } from './execution-context'
import { DEFAULT_PRICING_TABLE } from './pricing'
import type { PricingTable } from './pricing'

export interface EstimatorAppOptions {
  config: EstimatorConfig
  pricingTable?: PricingTable
  /** Replaces global fetch for calls to the takeoff service */
  fetchImpl?: FetchLike
}

export interface EstimatorApp {
  fetch(request: Request, ctx: ExecutionContext): Promise<Response>
}

export function createEstimatorApp(options: EstimatorAppOptions): EstimatorApp {
  const { config } = options
  const deps: EstimateJobDeps = {
    takeoff: {
      baseUrl: config.takeoffServiceUrl,
      timeoutMs: config.takeoffTimeoutMs,
      fetchImpl: options.fetchImpl,
    },
    pricingTable: options.pricingTable ?? DEFAULT_PRICING_TABLE,
  }

  return {
    async fetch(request: Request, ctx: ExecutionContext): Promise<Response> {
      const url = new URL(request.url)

      try {
        // Webhook from the takeoff service
        if (url.pathname === API_PATHS.conditionsChange) {
          if (request.method !== 'POST') {
            return methodNotAllowed(request.method, url.pathname)
          }
          return await handleConditionsChange(request, ctx, deps)
        }

        // Health check endpoint
        if (url.pathname === '/health') {
          if (request.method !== 'GET') {
            return methodNotAllowed(request.method, url.pathname)
          }
          const body: HealthResponse = {
            status: 'healthy',
            service: 'estimator-service',
            takeoffUrl: config.takeoffServiceUrl,
          }
          return jsonResponse(body)
        }

        if (url.pathname === '/') {
          if (request.method !== 'GET') {
            return methodNotAllowed(request.method, url.pathname)
          }
          return jsonResponse({
            service: 'Estimator Service API',
            version: '1.0.0',
            description: 'Cost estimation service for takeoff measurements',
            integration: {
              receivesWebhooksFrom: config.takeoffServiceUrl,
              webhookEndpoint: API_PATHS.conditionsChange,
            },
          })
        }

        return errorResponse(404, 'NOT_FOUND', `No route for ${request.method} ${url.pathname}`)
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error'
        console.error('[Estimator] Request error:', errorMessage)
        return errorResponse(500, 'INTERNAL_ERROR', errorMessage)
      }
    },
  }
}

export { loadConfig, loadPricingTable } from './config'
export type { Env, EstimatorConfig } from './config'
export { createExecutionContext } from './execution-context'
export type { ExecutionContext } from './execution-context'
