import {
  INVOICE_CATEGORIES,
  type CategoryBreakdown,
  type CurrencyTotal,
  type LedgerSummary,
} from "shared";
import type { Ledger } from "./ledger";

const roundCents = (value: number) => Math.round(value * 100) / 100;

const totalsPerCurrency = (ledger: Ledger): CurrencyTotal[] => {
  const totals = new Map<string, number>();
  for (const { record } of ledger) {
    if (record.amount === null) continue;
    totals.set(record.currency, (totals.get(record.currency) ?? 0) + record.amount);
  }
  return [...totals.entries()]
    .map(([currency, total]) => ({ currency, total: roundCents(total) }))
    .sort((a, b) => a.currency.localeCompare(b.currency));
};

/**
 * Dashboard figures for a ledger. Totals skip entries without an amount and are
 * kept per currency; the top category is the most frequent one, ties going to
 * the category listed first in the taxonomy.
 */
export const summarizeLedger = (ledger: Ledger): LedgerSummary => {
  const byCategory: CategoryBreakdown[] = INVOICE_CATEGORIES.map((category) => {
    const entries = ledger.filter((e) => e.record.category === category);
    return { category, count: entries.length, totals: totalsPerCurrency(entries) };
  }).filter((c) => c.count > 0);

  const topCategory = byCategory.reduce<CategoryBreakdown | null>(
    (top, c) => (top === null || c.count > top.count ? c : top),
    null,
  );

  return {
    invoiceCount: ledger.length,
    totalsByCurrency: totalsPerCurrency(ledger),
    topCategory: topCategory?.category ?? null,
    byCategory,
  };
};
