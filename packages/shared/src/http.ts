/**
 * Fetch-style HTTP helpers shared by both services
 */

import type { ApiErrorCode, ApiErrorResponse } from './api.types'

/** Minimal fetch signature, so tests can pass an in-process stand-in */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

/**
 * Serialize a body as a JSON response
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

/**
 * JSON error response in the `{ error: { code, message, details? } }` shape
 */
export function errorResponse(
  status: number,
  code: ApiErrorCode,
  message: string,
  details?: unknown[]
): Response {
  const body: ApiErrorResponse = {
    error: details ? { code, message, details } : { code, message },
  }
  return jsonResponse(body, status)
}

/**
 * 405 for a known path called with the wrong method
 */
export function methodNotAllowed(method: string, path: string): Response {
  return errorResponse(405, 'METHOD_NOT_ALLOWED', `${method} not allowed on ${path}`)
}

/**
 * Read a request body as JSON; `ok` is false when it does not parse
 */
export async function readJsonBody(request: Request): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    const body: unknown = await request.json()
    return { ok: true, body }
  } catch {
    return { ok: false }
  }
}
