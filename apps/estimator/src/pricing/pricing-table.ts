/**
 * Pricing Table
 *
 * Unit prices per pricing category. The table is an immutable value handed
 * to the rules engine, so tests and deployments can swap it without any
 * global state.
 */

import { z } from 'zod'

/**
 * Categories in classification priority order: a condition name is checked
 * for each keyword in turn and the first hit wins.
 */
export const PRICING_CATEGORIES = ['window', 'door', 'wall'] as const

export type PricingCategory = (typeof PRICING_CATEGORIES)[number]

export interface PricingRule {
  unitPrice: number
  /** Display unit, e.g. EA or SQ.M */
  unit: string
  description: string
  /** Case-insensitive substring a quantity name must contain to be priced */
  quantityMatch: string
}

export type PricingTable = Readonly<Record<PricingCategory, Readonly<PricingRule>>>

export const DEFAULT_PRICING_TABLE: PricingTable = Object.freeze({
  window: Object.freeze({
    unitPrice: 200.0,
    unit: 'EA',
    description: 'Window installation (per unit)',
    quantityMatch: 'count',
  }),
  door: Object.freeze({
    unitPrice: 300.0,
    unit: 'EA',
    description: 'Door installation (per unit)',
    quantityMatch: 'count',
  }),
  wall: Object.freeze({
    unitPrice: 50.0,
    unit: 'SQ.M',
    description: 'Wall construction (per square meter)',
    quantityMatch: 'area',
  }),
})

const PricingRuleSchema = z.object({
  unitPrice: z.number().nonnegative(),
  unit: z.string().min(1),
  description: z.string(),
  quantityMatch: z.string().min(1),
})

const PricingTableSchema = z.object({
  window: PricingRuleSchema,
  door: PricingRuleSchema,
  wall: PricingRuleSchema,
})

/**
 * Validate a pricing table read from configuration.
 * Throws a ZodError when a category is missing or a rule is malformed.
 */
export function parsePricingTable(input: unknown): PricingTable {
  const table = PricingTableSchema.parse(input)

  return Object.freeze({
    window: Object.freeze(table.window),
    door: Object.freeze(table.door),
    wall: Object.freeze(table.wall),
  })
}
