/**
 * Takeoff measurement model
 *
 * The page hierarchy served by the takeoff service and priced by the
 * estimator: zones → conditions → items → quantity values.
 */

// ============================================================================
// Geometry
// ============================================================================

/** 2D coordinate on the drawing */
export interface Point {
  x: number
  y: number
}

/**
 * Rectangle in normalized document coordinates.
 * The takeoff service also sends the derived width and height.
 */
export interface NormalizedBoundingBox {
  left: number
  top: number
  right: number
  bottom: number
  width?: number | null
  height?: number | null
}

export interface NameValuePair {
  name?: string | null
  value?: string | null
}

// ============================================================================
// Zones
// ============================================================================

/**
 * Scaled region of a drawing (e.g. "First Floor Plan" at 1:100)
 */
export interface TakeoffZone {
  id: string
  /** Scale factor, e.g. 100 for 1:100 */
  scale: number
  name?: string | null
  boundingBox?: NormalizedBoundingBox | null
  /** Resolution of the scanned drawing */
  dpi: number
}

// ============================================================================
// Conditions
// ============================================================================

export type ConditionMeasurementType = 'Count' | 'Area' | 'Linear'

/** Quantity a condition measures, e.g. Count in EA or Area in SQ.M */
export interface QuantityDefinition {
  name?: string | null
  unitOfMeasure?: string | null
  excludeAttachments?: boolean
}

/**
 * A named kind of constructible element (window, door, wall, ...)
 */
export interface Condition {
  id: string
  /** Display name, e.g. "Standard Window 1200x1500" */
  name?: string | null
  type?: ConditionMeasurementType | null
  description?: string | null
  layer?: string | null
  color?: string | null
  lineStyle?: string | null
  fillPattern?: string | null
  isAttachment?: boolean
  /** Grouping such as "Doors" or "Windows" */
  category?: string | null
  shape?: string | null
  quantities?: QuantityDefinition[] | null
  properties?: NameValuePair[] | null
  customAttributes?: NameValuePair[] | null
}

// ============================================================================
// Items
// ============================================================================

/**
 * Named numeric measurement on an item. Matched by name, not by a fixed enum.
 */
export interface QuantityValue {
  name?: string | null
  unitOfMeasure?: string | null
  value: number
}

/**
 * One measured instance of a condition.
 * Owned by its condition's item list; the ids point back at the owners.
 */
export interface TakeoffItem {
  id: string
  conditionId: string
  takeoffZoneId: string
  /** Set when the item is an attachment of another item */
  parentTakeoffItemId?: string | null
  points?: Point[] | null
  /** Rotation in degrees */
  angle?: number | null
  itemName?: string | null
  quantityValues?: QuantityValue[] | null
}

// ============================================================================
// Page state
// ============================================================================

export interface ConditionState {
  condition?: Condition | null
  takeoffItems?: TakeoffItem[] | null
}

export interface TakeoffZoneState {
  takeoffZone?: TakeoffZone | null
  conditions?: ConditionState[] | null
}

/**
 * Complete measurement state of one document page
 */
export interface PageConditionsState {
  takeoffZones?: TakeoffZoneState[] | null
}

export interface PageStateSummary {
  zones: number
  conditions: number
  items: number
}

/**
 * Count zones, conditions and items on a page, treating missing lists as empty
 */
export function summarizePageState(page: PageConditionsState): PageStateSummary {
  const zones = page.takeoffZones ?? []
  let conditions = 0
  let items = 0

  for (const zone of zones) {
    for (const conditionState of zone.conditions ?? []) {
      conditions++
      items += conditionState.takeoffItems?.length ?? 0
    }
  }

  return { zones: zones.length, conditions, items }
}
