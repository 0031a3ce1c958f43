export const INVOICE_CATEGORIES = [
  "Food & Beverage",
  "Transportation",
  "Office Supplies",
  "Utilities",
  "Software",
  "Other",
] as const;

export type InvoiceCategory = (typeof INVOICE_CATEGORIES)[number];

export const INVOICE_FIELDS = [
  "date",
  "vendor",
  "amount",
  "currency",
  "category",
] as const;

export type InvoiceField = (typeof INVOICE_FIELDS)[number];

export interface InvoiceRecord {
  /** ISO calendar date (YYYY-MM-DD), null when unknown */
  date: string | null;
  vendor: string;
  /** Non-negative decimal, null when unknown */
  amount: number | null;
  currency: string;
  category: InvoiceCategory;
}

export type LedgerEntryStatus = "parsed" | "degraded" | "manual";

export interface LedgerEntry {
  id: string;
  sourceFile: string | null;
  status: LedgerEntryStatus;
  missingFields: InvoiceField[];
  record: InvoiceRecord;
}
