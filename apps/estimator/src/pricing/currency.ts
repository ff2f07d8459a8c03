const AMOUNT_FORMAT = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
})

/**
 * Format an amount for display, e.g. 1234.5 → "$1,234.50".
 * The sign follows the symbol: -5 → "$-5.00".
 */
export function formatCurrency(amount: number, symbol = '$'): string {
  return `${symbol}${AMOUNT_FORMAT.format(amount)}`
}
