/**
 * Tests for the takeoff state client
 *
 * Uses an in-process fetch stand-in; no network access.
 */

import { describe, it, expect, vi } from 'vitest'
import type { FetchLike } from '@takeoff-link/shared'
import { buildPageStateUrl, fetchPageState, type TakeoffClientConfig } from '../takeoff-client'
import { DOCUMENT_ID, floorPlanPage } from './fixtures/page-states'

function makeConfig(fetchImpl: FetchLike): TakeoffClientConfig {
  return { baseUrl: 'http://takeoff.test', timeoutMs: 1000, fetchImpl }
}

function jsonReply(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

describe('buildPageStateUrl', () => {
  it('should add documentId and pageNumber as query parameters', () => {
    expect(buildPageStateUrl('http://takeoff.test', DOCUMENT_ID, 2)).toBe(
      `http://takeoff.test/api/Conditions/GetAllConditionsState?documentId=${DOCUMENT_ID}&pageNumber=2`
    )
  })

  it('should keep a path prefix on the base URL', () => {
    expect(buildPageStateUrl('http://gateway.test/takeoff', DOCUMENT_ID, 1)).toBe(
      `http://gateway.test/takeoff/api/Conditions/GetAllConditionsState?documentId=${DOCUMENT_ID}&pageNumber=1`
    )
  })
})

describe('fetchPageState', () => {
  it('should return the validated page state on 200', async () => {
    const page = floorPlanPage()
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonReply(page))

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result).toEqual({ success: true, pageState: page })
    expect(fetchImpl).toHaveBeenCalledTimes(1)

    const [url, init] = fetchImpl.mock.calls[0]
    expect(String(url)).toBe(
      `http://takeoff.test/api/Conditions/GetAllConditionsState?documentId=${DOCUMENT_ID}&pageNumber=1`
    )
    expect(init?.method).toBe('GET')
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  it('should accept an empty page', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(jsonReply({ takeoffZones: [] }))

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result).toEqual({ success: true, pageState: { takeoffZones: [] } })
  })

  it('should report non-200 responses as http_error with the body', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(new Response('page not found', { status: 404 }))

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 9)

    expect(result).toEqual({
      success: false,
      reason: 'http_error',
      error: 'HTTP 404',
      status: 404,
      body: 'page not found',
    })
  })

  it('should report a body that is not JSON as invalid_payload', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(new Response('<html></html>', { status: 200 }))

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result).toEqual({
      success: false,
      reason: 'invalid_payload',
      error: 'Response body is not valid JSON',
    })
  })

  it('should report a payload that breaks the schema as invalid_payload', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(
      jsonReply({ takeoffZones: [{ conditions: [{ takeoffItems: [{ id: 'not-a-uuid' }] }] }] })
    )

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.reason).toBe('invalid_payload')
      expect(result.error).toContain('takeoffZones.0.conditions.0.takeoffItems.0.id: Invalid uuid')
    }
  })

  it('should report a connection failure as unreachable', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'))

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result).toEqual({
      success: false,
      reason: 'unreachable',
      error: 'Cannot connect to takeoff service at http://takeoff.test',
    })
  })

  it('should report an aborted request as timeout', async () => {
    const timeoutError = Object.assign(new Error('The operation was aborted due to timeout'), {
      name: 'TimeoutError',
    })
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValue(timeoutError)

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result).toEqual({
      success: false,
      reason: 'timeout',
      error: 'Request timed out after 1000ms',
    })
  })

  it('should report anything else as unknown', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValue(new Error('socket hang up'))

    const result = await fetchPageState(makeConfig(fetchImpl), DOCUMENT_ID, 1)

    expect(result).toEqual({ success: false, reason: 'unknown', error: 'socket hang up' })
  })
})
