/**
 * Runtime schemas for payloads crossing the service boundary.
 *
 * Each schema is pinned to its hand-written type so the two cannot drift.
 * Optional fields accept both null and missing, as the takeoff service
 * serializes absent values as null.
 */

import { z } from 'zod'
import type {
  Condition,
  NameValuePair,
  NormalizedBoundingBox,
  PageConditionsState,
  Point,
  QuantityDefinition,
  QuantityValue,
  TakeoffItem,
  TakeoffZone,
} from './takeoff.types'
import type { ConditionsChange, ConditionsChangeAction } from './api.types'

// ============================================================================
// Primitives
// ============================================================================

const Uuid = z.string().uuid()

const OptionalText = z.string().nullish()

// ============================================================================
// Measurement model
// ============================================================================

export const PointSchema: z.ZodType<Point> = z.object({
  x: z.number(),
  y: z.number(),
})

export const BoundingBoxSchema: z.ZodType<NormalizedBoundingBox> = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
  width: z.number().nullish(),
  height: z.number().nullish(),
})

const NameValuePairSchema: z.ZodType<NameValuePair> = z.object({
  name: OptionalText,
  value: OptionalText,
})

export const TakeoffZoneSchema: z.ZodType<TakeoffZone> = z.object({
  id: Uuid,
  scale: z.number(),
  name: OptionalText,
  boundingBox: BoundingBoxSchema.nullish(),
  dpi: z.number().int(),
})

const QuantityDefinitionSchema: z.ZodType<QuantityDefinition> = z.object({
  name: OptionalText,
  unitOfMeasure: OptionalText,
  excludeAttachments: z.boolean().optional(),
})

export const ConditionSchema: z.ZodType<Condition> = z.object({
  id: Uuid,
  name: OptionalText,
  type: z.enum(['Count', 'Area', 'Linear']).nullish(),
  description: OptionalText,
  layer: OptionalText,
  color: OptionalText,
  lineStyle: OptionalText,
  fillPattern: OptionalText,
  isAttachment: z.boolean().optional(),
  category: OptionalText,
  shape: OptionalText,
  quantities: z.array(QuantityDefinitionSchema).nullish(),
  properties: z.array(NameValuePairSchema).nullish(),
  customAttributes: z.array(NameValuePairSchema).nullish(),
})

export const QuantityValueSchema: z.ZodType<QuantityValue> = z.object({
  name: OptionalText,
  unitOfMeasure: OptionalText,
  value: z.number(),
})

export const TakeoffItemSchema: z.ZodType<TakeoffItem> = z.object({
  id: Uuid,
  conditionId: Uuid,
  takeoffZoneId: Uuid,
  parentTakeoffItemId: Uuid.nullish(),
  points: z.array(PointSchema).nullish(),
  angle: z.number().nullish(),
  itemName: OptionalText,
  quantityValues: z.array(QuantityValueSchema).nullish(),
})

export const PageConditionsStateSchema: z.ZodType<PageConditionsState> = z.object({
  takeoffZones: z
    .array(
      z.object({
        takeoffZone: TakeoffZoneSchema.nullish(),
        conditions: z
          .array(
            z.object({
              condition: ConditionSchema.nullish(),
              takeoffItems: z.array(TakeoffItemSchema).nullish(),
            })
          )
          .nullish(),
      })
    )
    .nullish(),
})

// ============================================================================
// Webhook
// ============================================================================

const ConditionsChangeActionSchema: z.ZodType<ConditionsChangeAction> = z.object({
  actionName: OptionalText,
  entityType: OptionalText,
  orderNumber: z.number().int().nullish(),
  condition: ConditionSchema.nullish(),
  takeoffZone: TakeoffZoneSchema.nullish(),
  takeoffItem: TakeoffItemSchema.nullish(),
})

export const ConditionsChangeSchema: z.ZodType<ConditionsChange> = z.object({
  documentId: Uuid,
  pageNumber: z.number().int().min(1),
  actions: z.array(ConditionsChangeActionSchema).nullish(),
})

/**
 * Query string of GET /api/Conditions/GetAllConditionsState.
 * Parameters arrive as strings, so the page number is coerced.
 */
export const PageStateQuerySchema = z.object({
  documentId: Uuid,
  pageNumber: z.coerce.number().int().min(1),
})

// ============================================================================
// Helpers
// ============================================================================

/**
 * Flatten zod issues into `path: message` strings for API error details
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
    return `${path}: ${issue.message}`
  })
}
