/**
 * Takeoff Service
 *
 * Serves construction measurement state for a document page and, for
 * development, pushes change notifications to the estimator.
 */

import {
  API_PATHS,
  ConditionsChangeSchema,
  PageStateQuerySchema,
  describeIssues,
  errorResponse,
  jsonResponse,
  methodNotAllowed,
  readJsonBody,
  summarizePageState,
} from '@takeoff-link/shared'
import type { FetchLike, HealthResponse } from '@takeoff-link/shared'
import type { TakeoffConfig } from './config'
import { sendConditionsChange } from './estimator-webhook'
import { getMockPageState } from './mock-data'

export interface TakeoffAppOptions {
  config: TakeoffConfig
  /** Replaces global fetch for webhook delivery */
  fetchImpl?: FetchLike
}

export interface TakeoffApp {
  fetch(request: Request): Promise<Response>
}

export function createTakeoffApp(options: TakeoffAppOptions): TakeoffApp {
  const { config } = options

  /**
   * GET /api/Conditions/GetAllConditionsState?documentId=&pageNumber=
   */
  function getAllConditionsState(url: URL): Response {
    const query = PageStateQuerySchema.safeParse({
      documentId: url.searchParams.get('documentId') ?? undefined,
      pageNumber: url.searchParams.get('pageNumber') ?? undefined,
    })
    if (!query.success) {
      return errorResponse(400, 'VALIDATION_ERROR', 'Invalid query parameters', describeIssues(query.error))
    }

    const { documentId, pageNumber } = query.data
    console.log(`[Takeoff] GET ${API_PATHS.allConditionsState} documentId=${documentId}, pageNumber=${pageNumber}`)

    const pageState = getMockPageState(documentId, pageNumber)
    const summary = summarizePageState(pageState)
    console.log(
      `[Takeoff] Returning state: ${summary.zones} zone(s), ` +
        `${summary.conditions} condition(s), ${summary.items} item(s)`
    )

    return jsonResponse(pageState)
  }

  /**
   * POST /trigger
   * Manual webhook delivery (for testing the estimator integration)
   */
  async function trigger(request: Request): Promise<Response> {
    const parsedBody = await readJsonBody(request)
    if (!parsedBody.ok) {
      return errorResponse(400, 'INVALID_JSON', 'Request body must be valid JSON')
    }

    const validation = ConditionsChangeSchema.safeParse(parsedBody.body)
    if (!validation.success) {
      return errorResponse(400, 'VALIDATION_ERROR', 'Invalid conditions change payload', describeIssues(validation.error))
    }

    console.log(`[Takeoff] Notifying estimator at ${config.estimatorWebhookUrl}`)
    const delivery = await sendConditionsChange(
      { url: config.estimatorWebhookUrl, timeoutMs: config.estimatorTimeoutMs, fetchImpl: options.fetchImpl },
      validation.data
    )

    if (!delivery.success) {
      return errorResponse(502, 'UPSTREAM_ERROR', delivery.error ?? 'Webhook delivery failed')
    }

    return jsonResponse({ success: true, estimator: delivery.acknowledgement })
  }

  return {
    async fetch(request: Request): Promise<Response> {
      const url = new URL(request.url)

      try {
        if (url.pathname === API_PATHS.allConditionsState) {
          if (request.method !== 'GET') {
            return methodNotAllowed(request.method, url.pathname)
          }
          return getAllConditionsState(url)
        }

        if (url.pathname === '/trigger') {
          if (request.method !== 'POST') {
            return methodNotAllowed(request.method, url.pathname)
          }
          return await trigger(request)
        }

        // Health check endpoint
        if (url.pathname === '/health') {
          if (request.method !== 'GET') {
            return methodNotAllowed(request.method, url.pathname)
          }
          const body: HealthResponse = {
            status: 'healthy',
            service: 'takeoff-service',
            estimatorWebhookUrl: config.estimatorWebhookUrl,
          }
          return jsonResponse(body)
        }

        if (url.pathname === '/') {
          if (request.method !== 'GET') {
            return methodNotAllowed(request.method, url.pathname)
          }
          return jsonResponse({
            service: 'Takeoff Service API',
            version: '1.0.0',
            description: 'Construction measurement data provider',
            endpoints: {
              getConditionsState: API_PATHS.allConditionsState,
              trigger: '/trigger',
            },
          })
        }

        return errorResponse(404, 'NOT_FOUND', `No route for ${request.method} ${url.pathname}`)
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error'
        console.error('[Takeoff] Request error:', errorMessage)
        return errorResponse(500, 'INTERNAL_ERROR', errorMessage)
      }
    },
  }
}

export { loadConfig } from './config'
export type { Env, TakeoffConfig } from './config'
