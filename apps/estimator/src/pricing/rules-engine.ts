/**
 * Rules Engine
 *
 * Computes a deterministic cost estimate for a takeoff page:
 * - Classifies each condition by keyword in its name (window/door/wall)
 * - Picks the quantity values whose name matches the category's rule
 * - Sums quantity × unit price over every zone, condition and item
 *
 * Matching is case-insensitive substring containment and the first category
 * hit wins, so "Sliding Window Door" classifies as window.
 */

import type { PageConditionsState } from '@takeoff-link/shared'
import {
  DEFAULT_PRICING_TABLE,
  PRICING_CATEGORIES,
  type PricingCategory,
  type PricingTable,
} from './pricing-table'

/**
 * One priced quantity
 */
export interface EstimateLine {
  zoneName: string
  conditionName: string
  category: PricingCategory
  itemName: string
  quantityName: string
  unitOfMeasure: string
  quantity: number
  unitPrice: number
  /** quantity × unitPrice */
  amount: number
}

export interface EstimateResult {
  total: number
  lines: EstimateLine[]
  /** Items under a recognised condition, priced or not */
  itemsProcessed: number
  /** Names of conditions that matched no pricing category */
  skippedConditions: string[]
}

/**
 * Derive the pricing category from a condition name, or null when none applies
 */
export function classifyCondition(name: string | null | undefined): PricingCategory | null {
  if (!name) return null

  const lowered = name.toLowerCase()
  return PRICING_CATEGORIES.find((category) => lowered.includes(category)) ?? null
}

/**
 * Estimate with a line per priced quantity
 */
export function estimateWithTrace(
  page: PageConditionsState,
  table: PricingTable = DEFAULT_PRICING_TABLE
): EstimateResult {
  const zones = page.takeoffZones ?? []
  const result: EstimateResult = {
    total: 0,
    lines: [],
    itemsProcessed: 0,
    skippedConditions: [],
  }

  if (zones.length === 0) {
    console.warn('[Pricing] No takeoff zones found in page state')
    return result
  }

  for (const zoneState of zones) {
    const zoneName = zoneState.takeoffZone?.name ?? 'Unknown Zone'

    for (const conditionState of zoneState.conditions ?? []) {
      const conditionName = conditionState.condition?.name ?? 'Unknown Condition'
      const category = classifyCondition(conditionState.condition?.name)

      if (!category) {
        console.warn(`[Pricing] Unknown element type "${conditionName}" - skipping`)
        result.skippedConditions.push(conditionName)
        continue
      }

      const rule = table[category]
      const quantityMatch = rule.quantityMatch.toLowerCase()

      for (const item of conditionState.takeoffItems ?? []) {
        const itemName = item.itemName ?? 'Unnamed Item'
        let itemTotal = 0

        for (const quantity of item.quantityValues ?? []) {
          const quantityName = quantity.name ?? ''
          if (!quantityName.toLowerCase().includes(quantityMatch)) continue

          const amount = quantity.value * rule.unitPrice
          itemTotal += amount
          result.lines.push({
            zoneName,
            conditionName,
            category,
            itemName,
            quantityName,
            unitOfMeasure: quantity.unitOfMeasure ?? '',
            quantity: quantity.value,
            unitPrice: rule.unitPrice,
            amount,
          })
        }

        result.total += itemTotal
        result.itemsProcessed++
      }
    }
  }

  return result
}

/**
 * Total estimated cost of a page, unrounded
 */
export function estimate(page: PageConditionsState, table: PricingTable = DEFAULT_PRICING_TABLE): number {
  return estimateWithTrace(page, table).total
}
