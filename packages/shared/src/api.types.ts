/**
 * API request/response types shared by the takeoff and estimator services
 */

import type { Condition, TakeoffItem, TakeoffZone } from './takeoff.types'

// ============================================================================
// Common Types
// ============================================================================

export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'INVALID_JSON'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'UPSTREAM_ERROR'
  | 'INTERNAL_ERROR'

export interface ApiError {
  code: ApiErrorCode
  message: string
  details?: unknown[]
}

export interface ApiErrorResponse {
  error: ApiError
}

export interface HealthResponse {
  status: 'healthy'
  service: string
  takeoffUrl?: string
  estimatorWebhookUrl?: string
}

// ============================================================================
// Webhook: conditions change
// ============================================================================

export type ChangeActionName = 'Create' | 'Update' | 'Delete'

export type ChangeEntityType = 'TakeoffZone' | 'Condition' | 'TakeoffItem'

/**
 * One change inside a webhook delivery.
 * Names are kept as plain strings (see ChangeActionName, ChangeEntityType);
 * the takeoff service may add new kinds.
 */
export interface ConditionsChangeAction {
  actionName?: string | null
  entityType?: string | null
  /** Order of the change within the delivery */
  orderNumber?: number | null
  condition?: Condition | null
  takeoffZone?: TakeoffZone | null
  takeoffItem?: TakeoffItem | null
}

/**
 * POST /api/Conditions/PostConditionsChange
 */
export interface ConditionsChange {
  documentId: string
  /** 1-indexed */
  pageNumber: number
  actions?: ConditionsChangeAction[] | null
}

export interface ConditionsChangeAccepted {
  status: 'accepted'
  message: string
  documentId: string
  pageNumber: number
  actionsReceived: number
}

// ============================================================================
// State query
// ============================================================================

/**
 * GET /api/Conditions/GetAllConditionsState query parameters
 */
export interface PageStateQuery {
  documentId: string
  pageNumber: number
}

export const API_PATHS = {
  conditionsChange: '/api/Conditions/PostConditionsChange',
  allConditionsState: '/api/Conditions/GetAllConditionsState',
} as const
