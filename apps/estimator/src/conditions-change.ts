/**
 * POST /api/Conditions/PostConditionsChange
 *
 * Webhook called by the takeoff service when measurements are created,
 * updated or deleted. Logs the changes, schedules the estimate job and
 * acknowledges without waiting for it.
 */

import {
  ConditionsChangeSchema,
  describeIssues,
  errorResponse,
  jsonResponse,
  readJsonBody,
} from '@takeoff-link/shared'
import type { ConditionsChangeAccepted, ConditionsChangeAction } from '@takeoff-link/shared'
import { fetchAndEstimate } from './estimate-job'
import type { EstimateJobDeps } from './estimate-job'
import type { ExecutionContext } from './execution-context'

/**
 * One log line per action, e.g. "[1] Create Condition (Standard Window)"
 */
export function describeAction(action: ConditionsChangeAction): string {
  const order = action.orderNumber ?? '?'
  const actionName = action.actionName || 'Unknown'
  const entityType = action.entityType || 'Unknown'
  const entityName =
    action.condition?.name || action.takeoffZone?.name || action.takeoffItem?.itemName || 'N/A'

  return `[${order}] ${actionName} ${entityType} (${entityName})`
}

export async function handleConditionsChange(
  request: Request,
  ctx: ExecutionContext,
  deps: EstimateJobDeps
): Promise<Response> {
  const parsedBody = await readJsonBody(request)
  if (!parsedBody.ok) {
    return errorResponse(400, 'INVALID_JSON', 'Request body must be valid JSON')
  }

  const validation = ConditionsChangeSchema.safeParse(parsedBody.body)
  if (!validation.success) {
    console.warn('[Webhook] Rejected PostConditionsChange: invalid payload')
    return errorResponse(400, 'VALIDATION_ERROR', 'Invalid conditions change payload', describeIssues(validation.error))
  }

  const change = validation.data
  const actions = change.actions ?? []

  console.log(
    `[Webhook] PostConditionsChange received: documentId=${change.documentId}, ` +
      `pageNumber=${change.pageNumber}, actions=${actions.length}`
  )
  for (const action of actions) {
    console.log(`[Webhook]   ${describeAction(action)}`)
  }

  ctx.waitUntil(fetchAndEstimate(deps, change.documentId, change.pageNumber))

  const body: ConditionsChangeAccepted = {
    status: 'accepted',
    message: 'Change notification received. Processing in background.',
    documentId: change.documentId,
    pageNumber: change.pageNumber,
    actionsReceived: actions.length,
  }
  return jsonResponse(body)
}
