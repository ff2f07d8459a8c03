/**
 * Estimate Job
 *
 * Background work triggered by a conditions-change webhook: pull the full
 * page state from the takeoff service, price it and log the result.
 */

import { summarizePageState } from '@takeoff-link/shared'
import type { PageStateSummary } from '@takeoff-link/shared'
import { estimateWithTrace, formatCurrency } from './pricing'
import type { EstimateResult, PricingTable } from './pricing'
import { fetchPageState } from './takeoff-client'
import type { FetchFailureReason, TakeoffClientConfig } from './takeoff-client'

export interface EstimateJobDeps {
  takeoff: TakeoffClientConfig
  pricingTable: PricingTable
}

export type EstimateJobResult =
  | {
      success: true
      summary: PageStateSummary
      estimate: EstimateResult
      formattedTotal: string
    }
  | { success: false; reason: FetchFailureReason; error: string }

/**
 * Fetch the current page state and calculate its estimate.
 * Resolves with a failure result instead of rejecting.
 */
export async function fetchAndEstimate(
  deps: EstimateJobDeps,
  documentId: string,
  pageNumber: number
): Promise<EstimateJobResult> {
  console.log(
    `[Estimator] Fetching full state from takeoff: documentId=${documentId}, pageNumber=${pageNumber}`
  )

  const fetched = await fetchPageState(deps.takeoff, documentId, pageNumber)

  if (!fetched.success) {
    console.error(`[Estimator] Failed to fetch state from takeoff (${fetched.reason}): ${fetched.error}`)
    if (fetched.body) {
      console.error(`[Estimator] Response: ${fetched.body}`)
    }
    return { success: false, reason: fetched.reason, error: fetched.error }
  }

  const summary = summarizePageState(fetched.pageState)
  console.log(
    `[Estimator] Retrieved state: ${summary.zones} zone(s), ` +
      `${summary.conditions} condition(s), ${summary.items} item(s)`
  )

  const result = estimateWithTrace(fetched.pageState, deps.pricingTable)

  for (const line of result.lines) {
    console.log(
      `[Pricing] ${line.conditionName} / ${line.itemName}: ` +
        `${line.quantity} ${line.unitOfMeasure} × ${formatCurrency(line.unitPrice)} = ${formatCurrency(line.amount)}`
    )
  }

  const formattedTotal = formatCurrency(result.total)
  console.log(
    `[Estimator] Estimated cost for ${documentId} page ${pageNumber}: ${formattedTotal} ` +
      `(${result.itemsProcessed} item(s) priced)`
  )

  return { success: true, summary, estimate: result, formattedTotal }
}
