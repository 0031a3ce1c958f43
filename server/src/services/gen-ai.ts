import {
  GoogleGenerativeAI,
  SchemaType,
  type GenerationConfig,
} from "@google/generative-ai";
import { INVOICE_CATEGORIES } from "shared";
import { ExtractionFailedError } from "./errors";
import type { InvoiceImage } from "./intake";
import { logger } from "../utils/logger";

/** Remote model boundary: one image plus instruction in, raw response text out. */
export interface InvoiceExtractor {
  extract(image: InvoiceImage, instruction: string): Promise<string>;
}

export interface GeminiExtractorOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

const generationConfig: GenerationConfig = {
  temperature: 0.2,
  topP: 0.95,
  topK: 40,
  maxOutputTokens: 2048,
  responseMimeType: "application/json",
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      date: {
        type: SchemaType.STRING,
        nullable: true,
      },
      vendor: {
        type: SchemaType.STRING,
        nullable: true,
      },
      amount: {
        type: SchemaType.NUMBER,
        nullable: true,
      },
      currency: {
        type: SchemaType.STRING,
        nullable: true,
      },
      category: {
        type: SchemaType.STRING,
        format: "enum",
        enum: [...INVOICE_CATEGORIES],
      },
    },
    required: ["date", "vendor", "amount", "currency", "category"],
  },
};

export const createGeminiExtractor = ({
  apiKey,
  model,
  timeoutMs,
}: GeminiExtractorOptions): InvoiceExtractor => {
  const genAI = new GoogleGenerativeAI(apiKey);
  const generativeModel = genAI.getGenerativeModel(
    { model, generationConfig },
    { timeout: timeoutMs },
  );

  return {
    async extract(image, instruction) {
      logger.debug("Sending extraction request", {
        fileName: image.fileName,
        mimeType: image.mimeType,
        size: image.size,
      });

      try {
        const result = await generativeModel.generateContent([
          { text: instruction },
          {
            inlineData: {
              data: image.bytes.toString("base64"),
              mimeType: image.mimeType,
            },
          },
        ]);
        const text = result.response.text();
        if (!text.trim()) {
          throw new Error("Model returned an empty response");
        }
        logger.debug("Extraction response received", { fileName: image.fileName, text });
        return text;
      } catch (err) {
        logger.error(`Extraction request for ${image.fileName} failed:`, err);
        throw new ExtractionFailedError(image.fileName, { cause: err });
      }
    },
  };
};
