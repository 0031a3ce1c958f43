import { z } from "zod";
import { IntakeRejectedError } from "./errors";

export const ACCEPTED_MIME_TYPES = ["image/jpeg", "image/jpg", "image/png"];

export interface InvoiceImage {
  fileName: string;
  mimeType: string;
  size: number;
  bytes: Buffer;
}

const invoiceFileSchema = (maxFileSize: number) =>
  z
    .instanceof(File)
    .refine((f) => ACCEPTED_MIME_TYPES.includes(f.type.toLowerCase()), {
      message: "Only JPEG and PNG images are accepted",
    })
    .refine((f) => f.size > 0, { message: "File is empty" })
    .refine((f) => f.size <= maxFileSize, {
      message: `Max file size is ${maxFileSize / 1024 / 1024}MB`,
    });

export const validateInvoiceImage = async (
  file: File,
  maxFileSize: number,
): Promise<InvoiceImage> => {
  const result = invoiceFileSchema(maxFileSize).safeParse(file);
  if (!result.success) {
    throw new IntakeRejectedError(
      file.name,
      result.error.issues[0]?.message ?? "File rejected",
    );
  }

  return {
    fileName: file.name,
    mimeType: file.type.toLowerCase() === "image/jpg" ? "image/jpeg" : file.type.toLowerCase(),
    size: file.size,
    bytes: Buffer.from(await file.arrayBuffer()),
  };
};
