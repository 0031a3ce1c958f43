import { describe, it, expect } from 'vitest'
import { formatAmount, formatTotals } from '../formatAmount'

describe('formatAmount', () => {
  it('formats with two decimals and grouping', () => {
    expect(formatAmount(1234.5)).toBe('1,234.50')
    expect(formatAmount(1234.5, 'USD')).toBe('USD 1,234.50')
  })

  it('shows a dash for unknown amounts', () => {
    expect(formatAmount(null, 'USD')).toBe('—')
  })
})

describe('formatTotals', () => {
  it('joins totals per currency', () => {
    expect(
      formatTotals([
        { currency: 'IDR', total: 150000 },
        { currency: '', total: 3 },
      ])
    ).toBe('IDR 150,000.00 · ? 3.00')
  })

  it('shows zero without totals', () => {
    expect(formatTotals([])).toBe('0.00')
  })
})
