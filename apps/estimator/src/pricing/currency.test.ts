import { describe, it, expect } from 'vitest'
import { formatCurrency } from './currency'

describe('formatCurrency', () => {
  it('should add thousands separators and two decimals', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50')
    expect(formatCurrency(2095)).toBe('$2,095.00')
    expect(formatCurrency(1234567.891)).toBe('$1,234,567.89')
  })

  it('should format small amounts', () => {
    expect(formatCurrency(0)).toBe('$0.00')
    expect(formatCurrency(0.5)).toBe('$0.50')
    expect(formatCurrency(999.999)).toBe('$1,000.00')
  })

  it('should keep the sign after the symbol', () => {
    expect(formatCurrency(-5)).toBe('$-5.00')
  })

  it('should accept another symbol', () => {
    expect(formatCurrency(820, '£')).toBe('£820.00')
  })
})
