import ExcelJS from "exceljs";
import { ExportFailedError } from "./errors";
import type { Ledger } from "./ledger";
import { logger } from "../utils/logger";

export const EXPORT_FILE_NAME = "Invoice_Report.xlsx";
export const EXPORT_SHEET_NAME = "Invoices";
export const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

// Fixed so two exports of the same ledger only differ in zip timestamps.
const WORKBOOK_DATE = new Date(Date.UTC(2000, 0, 1));

export const buildWorkbook = (ledger: Ledger): ExcelJS.Workbook => {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "InvoiceIntel";
  workbook.created = WORKBOOK_DATE;
  workbook.modified = WORKBOOK_DATE;

  const sheet = workbook.addWorksheet(EXPORT_SHEET_NAME);
  sheet.columns = [
    { header: "Date", key: "date", width: 12 },
    { header: "Vendor", key: "vendor", width: 32 },
    { header: "Amount", key: "amount", width: 14, style: { numFmt: "0.00" } },
    { header: "Currency", key: "currency", width: 10 },
    { header: "Category", key: "category", width: 18 },
  ];

  for (const { record } of ledger) {
    sheet.addRow({
      date: record.date,
      vendor: record.vendor || null,
      amount: record.amount,
      currency: record.currency || null,
      category: record.category,
    });
  }

  return workbook;
};

export const exportLedgerToXlsx = async (ledger: Ledger): Promise<ArrayBuffer> => {
  try {
    const data = await buildWorkbook(ledger).xlsx.writeBuffer();
    // Copied into a standalone ArrayBuffer so it can be used directly as a response body.
    const file = new ArrayBuffer(data.byteLength);
    new Uint8Array(file).set(new Uint8Array(data));
    logger.debug("Ledger exported", { rows: ledger.length, bytes: file.byteLength });
    return file;
  } catch (err) {
    logger.error("Failed to export the ledger:", err);
    throw new ExportFailedError({ cause: err });
  }
};
