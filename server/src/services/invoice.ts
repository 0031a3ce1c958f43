import type { LedgerEntry, UploadOutcome } from "shared";
import { ExtractionFailedError, IntakeRejectedError } from "./errors";
import type { InvoiceExtractor } from "./gen-ai";
import { validateInvoiceImage } from "./intake";
import { renderInstruction } from "./instruction";
import { parseExtractionResponse } from "./invoice-parser";
import { createEntry } from "./ledger";
import { logger } from "../utils/logger";

export interface InvoicePipelineDeps {
  extractor: InvoiceExtractor;
  instructionTemplate: string;
  maxFileSize: number;
}

export interface InvoiceBatchResult {
  outcomes: UploadOutcome[];
  /** Successfully processed entries, in upload order */
  entries: LedgerEntry[];
}

type SingleResult =
  | { outcome: UploadOutcome; entry: LedgerEntry }
  | { outcome: UploadOutcome; entry?: undefined };

export const processInvoiceUpload = async (
  file: File,
  { extractor, instructionTemplate, maxFileSize }: InvoicePipelineDeps,
): Promise<SingleResult> => {
  logger.debug("processInvoiceUpload called", { fileName: file.name, fileType: file.type, fileSize: file.size });

  let responseText: string;
  try {
    const image = await validateInvoiceImage(file, maxFileSize);
    responseText = await extractor.extract(image, renderInstruction(instructionTemplate));
  } catch (err) {
    if (err instanceof IntakeRejectedError) {
      logger.warn(`Rejected ${file.name}: ${err.message}`);
      return { outcome: { fileName: file.name, status: "rejected", error: err.message } };
    }
    const failure =
      err instanceof ExtractionFailedError
        ? err
        : new ExtractionFailedError(file.name, { cause: err });
    logger.error(`Failed to extract ${file.name}:`, err);
    return { outcome: { fileName: file.name, status: "failed", error: failure.message } };
  }

  const parsed = parseExtractionResponse(responseText);
  const entry = createEntry(file.name, parsed);
  if (entry.status === "degraded") {
    logger.info(`Extracted ${file.name} with missing fields`, entry.missingFields);
  } else {
    logger.info(`Extracted ${file.name}`);
  }

  return {
    outcome: { fileName: file.name, status: entry.status === "degraded" ? "degraded" : "parsed", entryId: entry.id },
    entry,
  };
};

/**
 * Runs intake, extraction and parsing for each file in upload order. A failure
 * on one file is reported in its outcome and never stops the rest.
 */
export const processInvoiceUploads = async (
  files: readonly File[],
  deps: InvoicePipelineDeps,
): Promise<InvoiceBatchResult> => {
  const outcomes: UploadOutcome[] = [];
  const entries: LedgerEntry[] = [];

  for (const file of files) {
    const result = await processInvoiceUpload(file, deps);
    outcomes.push(result.outcome);
    if (result.entry) entries.push(result.entry);
  }

  return { outcomes, entries };
};
