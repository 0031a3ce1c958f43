import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { format } from "date-fns";
import { INVOICE_CATEGORIES } from "shared";

export const DEFAULT_INSTRUCTION_TEMPLATE_PATH = fileURLToPath(
  new URL("../../prompts/extraction.txt", import.meta.url),
);

export const loadInstructionTemplate = async (
  path: string = DEFAULT_INSTRUCTION_TEMPLATE_PATH,
): Promise<string> => {
  const template = await readFile(path, "utf-8");
  if (!template.trim()) {
    throw new Error(`Instruction template at ${path} is empty`);
  }
  return template;
};

export const renderInstruction = (template: string, today: Date = new Date()): string =>
  template
    .replaceAll("{{categories}}", INVOICE_CATEGORIES.join(", "))
    .replaceAll("{{today}}", format(today, "yyyy-MM-dd"));
