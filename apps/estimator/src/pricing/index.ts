/**
 * Pricing Module Exports
 *
 * Deterministic cost estimation from takeoff quantities.
 */

export { estimate, estimateWithTrace, classifyCondition } from './rules-engine'

export type { EstimateLine, EstimateResult } from './rules-engine'

export { DEFAULT_PRICING_TABLE, PRICING_CATEGORIES, parsePricingTable } from './pricing-table'

export type { PricingCategory, PricingRule, PricingTable } from './pricing-table'

export { formatCurrency } from './currency'
