/**
 * Takeoff State Client
 *
 * Fetches the complete measurement state of a document page from the
 * takeoff service. One attempt per call; failures come back as a result
 * value rather than an exception.
 */

import { API_PATHS, PageConditionsStateSchema, describeIssues } from '@takeoff-link/shared'
import type { FetchLike, PageConditionsState } from '@takeoff-link/shared'

export interface TakeoffClientConfig {
  /** Base URL without trailing slash, e.g. http://localhost:8000 */
  baseUrl: string
  timeoutMs: number
  fetchImpl?: FetchLike
}

export type FetchFailureReason = 'unreachable' | 'timeout' | 'http_error' | 'invalid_payload' | 'unknown'

export type FetchPageStateResult =
  | { success: true; pageState: PageConditionsState }
  | {
      success: false
      reason: FetchFailureReason
      error: string
      /** HTTP status, for http_error */
      status?: number
      /** Response text, for http_error */
      body?: string
    }

/**
 * Build the state query URL for a document page
 */
export function buildPageStateUrl(baseUrl: string, documentId: string, pageNumber: number): string {
  const url = new URL(`${baseUrl}${API_PATHS.allConditionsState}`)
  url.searchParams.set('documentId', documentId)
  url.searchParams.set('pageNumber', String(pageNumber))
  return url.toString()
}

/**
 * GET /api/Conditions/GetAllConditionsState and validate the payload
 */
export async function fetchPageState(
  config: TakeoffClientConfig,
  documentId: string,
  pageNumber: number
): Promise<FetchPageStateResult> {
  const fetchImpl = config.fetchImpl ?? fetch
  const url = buildPageStateUrl(config.baseUrl, documentId, pageNumber)

  let response: Response
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(config.timeoutMs),
    })
  } catch (error) {
    return classifyFetchError(error, config)
  }

  if (response.status !== 200) {
    const body = await response.text().catch(() => '')
    return {
      success: false,
      reason: 'http_error',
      error: `HTTP ${response.status}`,
      status: response.status,
      body,
    }
  }

  let payload: unknown
  try {
    payload = await response.json()
  } catch {
    return { success: false, reason: 'invalid_payload', error: 'Response body is not valid JSON' }
  }

  const parsed = PageConditionsStateSchema.safeParse(payload)
  if (!parsed.success) {
    return {
      success: false,
      reason: 'invalid_payload',
      error: describeIssues(parsed.error).join('; '),
    }
  }

  return { success: true, pageState: parsed.data }
}

function classifyFetchError(error: unknown, config: TakeoffClientConfig): FetchPageStateResult {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return {
      success: false,
      reason: 'timeout',
      error: `Request timed out after ${config.timeoutMs}ms`,
    }
  }

  // undici reports refused connections and DNS failures as TypeError('fetch failed')
  if (error instanceof TypeError) {
    return {
      success: false,
      reason: 'unreachable',
      error: `Cannot connect to takeoff service at ${config.baseUrl}`,
    }
  }

  return {
    success: false,
    reason: 'unknown',
    error: error instanceof Error ? error.message : 'Unknown error',
  }
}
