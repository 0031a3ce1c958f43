import { format, getYear, isValid, parse } from "date-fns";
import { z } from "zod";
import {
  INVOICE_CATEGORIES,
  type InvoiceCategory,
  type InvoiceField,
  type InvoiceRecord,
} from "shared";

export interface ParsedInvoice {
  record: InvoiceRecord;
  missingFields: InvoiceField[];
}

const DATE_FORMATS = ["yyyy-MM-dd", "yyyy/MM/dd", "dd/MM/yyyy", "dd-MM-yyyy", "dd.MM.yyyy"];

// Keys the model has been seen to use for each field, canonical name first.
const FIELD_ALIASES: Record<InvoiceField, string[]> = {
  date: ["date", "invoice_date", "transactionDate", "transaction_date"],
  vendor: ["vendor", "vendor_name", "vendorName", "merchant"],
  amount: ["amount", "total_amount", "totalAmount", "total"],
  currency: ["currency", "currency_code"],
  category: ["category"],
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const findClosingBrace = (text: string, start: number): number => {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
};

const firstObject = (value: unknown): Record<string, unknown> | null => {
  if (isRecord(value)) return value;
  if (Array.isArray(value)) return value.find(isRecord) ?? null;
  return null;
};

/**
 * Locates the JSON object in a model response, tolerating markdown fences and
 * prose around it. Returns null when no object can be decoded.
 */
export const extractJsonPayload = (text: string): Record<string, unknown> | null => {
  const cleaned = text.replace(/```(?:json)?/gi, "").trim();

  const direct = firstObject(tryParseJson(cleaned));
  if (direct) return direct;

  for (
    let start = cleaned.indexOf("{");
    start !== -1;
    start = cleaned.indexOf("{", start + 1)
  ) {
    const end = findClosingBrace(cleaned, start);
    if (end === -1) continue;
    const candidate = tryParseJson(cleaned.slice(start, end + 1));
    if (isRecord(candidate)) return candidate;
  }

  return null;
};

// One separator between a leading group and exactly three digits, e.g. "150.000" or "1,234".
const SINGLE_THOUSANDS_GROUP = /^[1-9]\d{0,2}[.,]\d{3}$/;

/**
 * Normalizes a model-supplied amount to a plain non-negative decimal.
 * Currency symbols and codes around the number are stripped; the right-most of
 * "." and "," is the decimal separator when both appear. Letters inside the
 * number make it unparsable.
 */
export const parseAmount = (value: unknown): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  if (trimmed.startsWith("(") && trimmed.endsWith(")")) return null;

  const core = trimmed.replace(/^[^\d-]+/, "").replace(/\D+$/, "");
  if (!/^\d[\d.,\s]*$/.test(core)) return null;
  const digits = core.replace(/\s/g, "");

  const lastDot = digits.lastIndexOf(".");
  const lastComma = digits.lastIndexOf(",");
  let normalized: string;

  if (lastDot !== -1 && lastComma !== -1) {
    normalized =
      lastDot > lastComma
        ? digits.replace(/,/g, "")
        : digits.replace(/\./g, "").replace(",", ".");
  } else if (lastDot !== -1 || lastComma !== -1) {
    const separator = lastDot !== -1 ? "." : ",";
    const count = digits.split(separator).length - 1;
    normalized =
      count > 1 || SINGLE_THOUSANDS_GROUP.test(digits)
        ? digits.split(separator).join("")
        : digits.replace(separator, ".");
  } else {
    normalized = digits;
  }

  const amount = Number(normalized);
  return Number.isFinite(amount) ? amount : null;
};

/** Returns the date as YYYY-MM-DD, or null when it is not a real calendar date. */
export const parseInvoiceDate = (value: unknown): string | null => {
  if (typeof value !== "string") return null;

  const trimmed = value.trim();
  const isoDateTime = /^(\d{4}-\d{2}-\d{2})[T ]/.exec(trimmed);
  const candidate = isoDateTime?.[1] ?? trimmed;

  for (const dateFormat of DATE_FORMATS) {
    const parsed = parse(candidate, dateFormat, new Date());
    if (isValid(parsed) && getYear(parsed) >= 1900 && getYear(parsed) <= 2100) {
      return format(parsed, "yyyy-MM-dd");
    }
  }
  return null;
};

export const coerceCategory = (value: unknown): InvoiceCategory => {
  if (typeof value !== "string") return "Other";
  const wanted = value.trim().toLowerCase();
  return INVOICE_CATEGORIES.find((c) => c.toLowerCase() === wanted) ?? "Other";
};

export const parseText = (value: unknown): string => {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
};

const invoicePayloadSchema = z.object({
  date: z.unknown().transform(parseInvoiceDate),
  vendor: z.unknown().transform(parseText),
  amount: z.unknown().transform(parseAmount),
  currency: z.unknown().transform((v) => parseText(v).toUpperCase()),
  category: z.unknown().transform(coerceCategory),
});

const pickField = (payload: Record<string, unknown>, field: InvoiceField): unknown => {
  for (const key of FIELD_ALIASES[field]) {
    const value = payload[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
};

/**
 * Decodes one model response into a record. Never throws: fields that cannot be
 * recovered are set to their empty value and reported in missingFields.
 */
export const parseExtractionResponse = (text: string): ParsedInvoice => {
  const payload = extractJsonPayload(text) ?? {};

  const canonical = {
    date: pickField(payload, "date"),
    vendor: pickField(payload, "vendor"),
    amount: pickField(payload, "amount"),
    currency: pickField(payload, "currency"),
    category: pickField(payload, "category"),
  };
  const record: InvoiceRecord = invoicePayloadSchema.parse(canonical);

  const missingFields: InvoiceField[] = [];
  if (record.date === null) missingFields.push("date");
  if (!record.vendor) missingFields.push("vendor");
  if (record.amount === null) missingFields.push("amount");
  if (!record.currency) missingFields.push("currency");
  if (typeof canonical.category !== "string" || !canonical.category.trim()) {
    missingFields.push("category");
  }

  return { record, missingFields };
};
