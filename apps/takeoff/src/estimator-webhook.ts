/**
 * Estimator webhook client
 *
 * Delivers a conditions-change notification to the estimator service.
 * Single attempt; the outcome is returned, not thrown.
 */

import type { ConditionsChange, ConditionsChangeAccepted, FetchLike } from '@takeoff-link/shared'

export interface WebhookConfig {
  url: string
  timeoutMs: number
  fetchImpl?: FetchLike
}

export interface WebhookDeliveryResult {
  success: boolean
  status?: number
  /** Estimator acknowledgement on success */
  acknowledgement?: ConditionsChangeAccepted
  error?: string
}

function isAcknowledgement(value: unknown): value is ConditionsChangeAccepted {
  return (
    typeof value === 'object' &&
    value !== null &&
    'status' in value &&
    value.status === 'accepted'
  )
}

/**
 * POST a change notification to the estimator
 */
export async function sendConditionsChange(
  config: WebhookConfig,
  change: ConditionsChange
): Promise<WebhookDeliveryResult> {
  const fetchImpl = config.fetchImpl ?? fetch

  try {
    const response = await fetchImpl(config.url, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(change),
      signal: AbortSignal.timeout(config.timeoutMs),
    })

    if (!response.ok) {
      const errorText = await response.text().catch(() => '')
      console.error(`[Webhook] Estimator rejected notification: HTTP ${response.status} ${errorText}`)
      return { success: false, status: response.status, error: `HTTP ${response.status}` }
    }

    const body: unknown = await response.json().catch(() => null)
    if (!isAcknowledgement(body)) {
      console.error('[Webhook] Unexpected acknowledgement from estimator:', JSON.stringify(body))
      return { success: false, status: response.status, error: 'Unexpected acknowledgement from estimator' }
    }

    return { success: true, status: response.status, acknowledgement: body }
  } catch (error) {
    let errorMessage = error instanceof Error ? error.message : 'Unknown error'
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      errorMessage = `Estimator did not respond within ${config.timeoutMs}ms`
    }
    console.error('[Webhook] Delivery failed:', errorMessage)
    return { success: false, error: errorMessage }
  }
}
