import type { InvoiceField } from "shared";

export class IntakeRejectedError extends Error {
  constructor(
    readonly fileName: string,
    reason: string,
  ) {
    super(reason);
    this.name = "IntakeRejectedError";
  }
}

export class ExtractionFailedError extends Error {
  constructor(
    readonly fileName: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to extract invoice data from ${fileName}`, options);
    this.name = "ExtractionFailedError";
  }
}

export class EditRejectedError extends Error {
  constructor(
    readonly field: InvoiceField,
    reason: string,
  ) {
    super(reason);
    this.name = "EditRejectedError";
  }
}

export class ExportFailedError extends Error {
  constructor(options?: { cause?: unknown }) {
    super("Failed to export the ledger", options);
    this.name = "ExportFailedError";
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

export class EntryNotFoundError extends Error {
  constructor(readonly entryId: string) {
    super(`Entry ${entryId} not found`);
    this.name = "EntryNotFoundError";
  }
}
