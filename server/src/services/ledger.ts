import { randomUUID } from "node:crypto";
import { INVOICE_FIELDS, type InvoiceField, type InvoiceRecord, type LedgerEntry } from "shared";
import { EditRejectedError, EntryNotFoundError } from "./errors";
import {
  coerceCategory,
  parseAmount,
  parseInvoiceDate,
  type ParsedInvoice,
} from "./invoice-parser";

export type Ledger = readonly LedgerEntry[];

export type EditResult =
  | { ok: true; ledger: Ledger; entry: LedgerEntry }
  | { ok: false; ledger: Ledger; error: EditRejectedError };

export const emptyRecord = (): InvoiceRecord => ({
  date: null,
  vendor: "",
  amount: null,
  currency: "",
  category: "Other",
});

const isBlank = (value: unknown) =>
  value === null || value === undefined || (typeof value === "string" && !value.trim());

const blankFields = (record: InvoiceRecord): InvoiceField[] =>
  INVOICE_FIELDS.filter((f) => f !== "category" && isBlank(record[f]));

export const createEntry = (sourceFile: string, parsed: ParsedInvoice): LedgerEntry => ({
  id: randomUUID(),
  sourceFile,
  status: parsed.missingFields.length ? "degraded" : "parsed",
  missingFields: [...parsed.missingFields],
  record: { ...parsed.record },
});

export const appendEntries = (ledger: Ledger, entries: readonly LedgerEntry[]): Ledger => [
  ...ledger,
  ...entries,
];

export const addBlankEntry = (ledger: Ledger): { ledger: Ledger; entry: LedgerEntry } => {
  const record = emptyRecord();
  const entry: LedgerEntry = {
    id: randomUUID(),
    sourceFile: null,
    status: "manual",
    missingFields: blankFields(record),
    record,
  };
  return { ledger: [...ledger, entry], entry };
};

export const deleteEntry = (ledger: Ledger, entryId: string): Ledger => {
  if (!ledger.some((e) => e.id === entryId)) {
    throw new EntryNotFoundError(entryId);
  }
  return ledger.filter((e) => e.id !== entryId);
};

const requireText = (field: "vendor" | "currency", value: unknown): string => {
  if (isBlank(value)) return "";
  if (typeof value !== "string") {
    throw new EditRejectedError(field, `${field === "vendor" ? "Vendor" : "Currency"} must be text`);
  }
  return value.trim();
};

/**
 * Returns a copy of the record with one field overwritten, applying the same
 * constraints as extraction. Throws EditRejectedError for values that violate them.
 */
export const applyFieldEdit = (
  record: InvoiceRecord,
  field: InvoiceField,
  value: unknown,
): InvoiceRecord => {
  switch (field) {
    case "amount": {
      if (isBlank(value)) return { ...record, amount: null };
      const negative =
        (typeof value === "number" && value < 0) ||
        (typeof value === "string" && value.trim().startsWith("-"));
      if (negative) {
        throw new EditRejectedError(field, "Amount must not be negative");
      }
      const amount = parseAmount(value);
      if (amount === null) {
        throw new EditRejectedError(field, "Amount must be a number");
      }
      return { ...record, amount };
    }
    case "date": {
      if (isBlank(value)) return { ...record, date: null };
      const date = parseInvoiceDate(value);
      if (date === null) {
        throw new EditRejectedError(field, "Date must be a valid calendar date (YYYY-MM-DD)");
      }
      return { ...record, date };
    }
    case "category": {
      const category = coerceCategory(value);
      const requested = typeof value === "string" ? value.trim().toLowerCase() : "";
      if (category.toLowerCase() !== requested) {
        throw new EditRejectedError(field, "Category must be one of the configured categories");
      }
      return { ...record, category };
    }
    case "vendor":
      return { ...record, vendor: requireText(field, value) };
    case "currency":
      return { ...record, currency: requireText(field, value).toUpperCase() };
  }
};

export const editField = (
  ledger: Ledger,
  entryId: string,
  field: InvoiceField,
  value: unknown,
): EditResult => {
  const target = ledger.find((e) => e.id === entryId);
  if (!target) {
    throw new EntryNotFoundError(entryId);
  }

  let record: InvoiceRecord;
  try {
    record = applyFieldEdit(target.record, field, value);
  } catch (err) {
    if (err instanceof EditRejectedError) {
      return { ok: false, ledger, error: err };
    }
    throw err;
  }

  const missingFields = target.missingFields.filter((f) => f !== field);
  if (field !== "category" && isBlank(record[field])) {
    missingFields.push(field);
  }
  const entry: LedgerEntry = { ...target, record, missingFields };

  return {
    ok: true,
    ledger: ledger.map((e) => (e.id === entryId ? entry : e)),
    entry,
  };
};
