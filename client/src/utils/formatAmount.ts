import type { CurrencyTotal } from 'shared'

export function formatAmount(amount: number | null, currency = ''): string {
  if (amount === null) return '—'
  const formatted = amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })
  return currency ? `${currency} ${formatted}` : formatted
}

export function formatTotals(totals: CurrencyTotal[]): string {
  if (!totals.length) return '0.00'
  return totals.map((t) => formatAmount(t.total, t.currency || '?')).join(' · ')
}
