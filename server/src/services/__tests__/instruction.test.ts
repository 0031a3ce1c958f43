import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadInstructionTemplate, renderInstruction } from "../instruction";

describe("loadInstructionTemplate", () => {
  it("reads the bundled template by default", async () => {
    const template = await loadInstructionTemplate();
    expect(template).toContain("{{categories}}");
    expect(template).toContain("{{today}}");
  });

  it("reads a template from a configured path", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "instruction-"));
    const file = path.join(dir, "custom.txt");
    await writeFile(file, "Extract fields. Categories: {{categories}}");

    expect(await loadInstructionTemplate(file)).toBe("Extract fields. Categories: {{categories}}");
  });

  it("refuses an empty template", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "instruction-"));
    const file = path.join(dir, "empty.txt");
    await writeFile(file, "  \n");

    await expect(loadInstructionTemplate(file)).rejects.toThrow("is empty");
  });
});

describe("renderInstruction", () => {
  it("fills in the taxonomy and today's date", () => {
    const rendered = renderInstruction(
      "Use one of: {{categories}}. Today is {{today}}. Again: {{categories}}",
      new Date(2024, 2, 15),
    );

    const categories = "Food & Beverage, Transportation, Office Supplies, Utilities, Software, Other";
    expect(rendered).toBe(`Use one of: ${categories}. Today is 2024-03-15. Again: ${categories}`);
  });
});
