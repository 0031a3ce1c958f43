import type { InvoiceCategory, InvoiceField, LedgerEntry } from "./invoice";

export interface CurrencyTotal {
  currency: string;
  total: number;
}

export interface CategoryBreakdown {
  category: InvoiceCategory;
  count: number;
  totals: CurrencyTotal[];
}

export interface LedgerSummary {
  invoiceCount: number;
  totalsByCurrency: CurrencyTotal[];
  topCategory: InvoiceCategory | null;
  byCategory: CategoryBreakdown[];
}

export interface SessionView {
  sessionId: string;
  entries: LedgerEntry[];
  summary: LedgerSummary;
}

export type UploadOutcomeStatus = "parsed" | "degraded" | "rejected" | "failed";

export interface UploadOutcome {
  fileName: string;
  status: UploadOutcomeStatus;
  entryId?: string;
  error?: string;
}

export interface UploadResponse {
  outcomes: UploadOutcome[];
  session: SessionView;
}

export interface EditRejectedResponse {
  error: string;
  field: InvoiceField;
  session: SessionView;
}

export interface AppConfigResponse {
  categories: InvoiceCategory[];
  acceptedMimeTypes: string[];
  maxFileSize: number;
}
