import { beforeEach, describe, it, expect, vi } from "vitest";
import ExcelJS from "exceljs";
import type { EditRejectedResponse, SessionView, UploadResponse } from "shared";
import { createApp } from "../app";
import type { InvoiceExtractor } from "../services/gen-ai";
import { SessionStore } from "../services/session-store";

const png = (name: string) => new File([new Uint8Array([1, 2, 3])], name, { type: "image/png" });

const responses: Record<string, string> = {
  "uber.png": '{"date": "2024-08-01", "vendor": "Uber", "amount": 18.2, "currency": "USD", "category": "Transportation"}',
  "cafe.png": 'Sure! ```json\n{"date": "2024-08-02", "vendor": "Cafe Nero", "amount": "$4.50", "currency": "USD", "category": "Food & Beverage"}\n```',
  "blurry.png": "I cannot read this invoice.",
};

const setup = () => {
  const extract = vi.fn<InvoiceExtractor["extract"]>(async (image) => {
    const text = responses[image.fileName];
    if (!text) throw new Error("remote error 503");
    return text;
  });
  const app = createApp({
    sessions: new SessionStore({ ttlMs: 60_000 }),
    extractor: { extract },
    instructionTemplate: "Extract. Categories: {{categories}}",
    maxFileSize: 1024,
  });
  return { app, extract };
};

const json = async <T>(res: Response): Promise<T> => res.json();

describe("app", () => {
  let app: ReturnType<typeof setup>["app"];
  let extract: ReturnType<typeof setup>["extract"];
  let sessionId: string;

  const upload = async (...files: File[]) => {
    const form = new FormData();
    for (const file of files) form.append("files", file);
    return app.request(`/api/sessions/${sessionId}/invoices`, { method: "POST", body: form });
  };

  const patch = (entryId: string, body: unknown) =>
    app.request(`/api/sessions/${sessionId}/entries/${entryId}`, {
      method: "PATCH",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  beforeEach(async () => {
    ({ app, extract } = setup());
    const res = await app.request("/api/sessions", { method: "POST" });
    expect(res.status).toBe(201);
    sessionId = (await json<SessionView>(res)).sessionId;
  });

  it("answers health checks", async () => {
    const res = await app.request("/healthz");
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("OK");
  });

  it("exposes the upload configuration", async () => {
    const res = await app.request("/api/config");
    expect(await res.json()).toEqual({
      categories: ["Food & Beverage", "Transportation", "Office Supplies", "Utilities", "Software", "Other"],
      acceptedMimeTypes: ["image/jpeg", "image/jpg", "image/png"],
      maxFileSize: 1024,
    });
  });

  it("processes a batch and reports each file", async () => {
    const res = await upload(
      png("uber.png"),
      new File(["%PDF"], "scan.pdf", { type: "application/pdf" }),
      png("down.png"),
      png("cafe.png"),
      png("blurry.png"),
    );
    expect(res.status).toBe(200);
    const body = await json<UploadResponse>(res);

    expect(body.outcomes.map((o) => [o.fileName, o.status])).toEqual([
      ["uber.png", "parsed"],
      ["scan.pdf", "rejected"],
      ["down.png", "failed"],
      ["cafe.png", "parsed"],
      ["blurry.png", "degraded"],
    ]);
    expect(body.session.entries.map((e) => e.record.vendor)).toEqual(["Uber", "Cafe Nero", ""]);
    expect(body.session.entries[1].record.amount).toBe(4.5);
    expect(body.session.summary.invoiceCount).toBe(3);
    expect(body.session.summary.totalsByCurrency).toEqual([{ currency: "USD", total: 22.7 }]);
    expect(extract).toHaveBeenCalledTimes(4);
  });

  it("appends later batches after earlier ones", async () => {
    await upload(png("cafe.png"));
    const res = await upload(png("uber.png"));
    const body = await json<UploadResponse>(res);

    expect(body.session.entries.map((e) => e.record.vendor)).toEqual(["Cafe Nero", "Uber"]);
  });

  it("requires at least one file", async () => {
    const res = await app.request(`/api/sessions/${sessionId}/invoices`, {
      method: "POST",
      body: new FormData(),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Upload at least one image in the 'files' field" });
  });

  it("rejects a text value in the files field", async () => {
    const form = new FormData();
    form.append("files", "not-a-file");
    const res = await app.request(`/api/sessions/${sessionId}/invoices`, { method: "POST", body: form });

    expect(res.status).toBe(400);
    expect(extract).not.toHaveBeenCalled();
  });

  it("edits a field and returns the updated session", async () => {
    const { session } = await json<UploadResponse>(await upload(png("uber.png")));
    const res = await patch(session.entries[0].id, { field: "vendor", value: "Uber Eats" });

    expect(res.status).toBe(200);
    const view = await json<SessionView>(res);
    expect(view.entries[0].record.vendor).toBe("Uber Eats");
  });

  it("rejects a negative amount and keeps the stored value", async () => {
    const { session } = await json<UploadResponse>(await upload(png("uber.png")));
    const res = await patch(session.entries[0].id, { field: "amount", value: -5 });

    expect(res.status).toBe(422);
    const body = await json<EditRejectedResponse>(res);
    expect(body.error).toBe("Amount must not be negative");
    expect(body.field).toBe("amount");
    expect(body.session.entries[0].record.amount).toBe(18.2);
  });

  it("validates the edit payload", async () => {
    const { session } = await json<UploadResponse>(await upload(png("uber.png")));
    const res = await patch(session.entries[0].id, { field: "invoice_number", value: "1" });
    expect(res.status).toBe(400);
  });

  it("adds and deletes entries", async () => {
    const added = await app.request(`/api/sessions/${sessionId}/entries`, { method: "POST" });
    expect(added.status).toBe(201);
    const view = await json<SessionView>(added);
    expect(view.entries).toHaveLength(1);
    expect(view.entries[0].status).toBe("manual");

    const deleted = await app.request(`/api/sessions/${sessionId}/entries/${view.entries[0].id}`, {
      method: "DELETE",
    });
    expect(deleted.status).toBe(200);
    expect((await json<SessionView>(deleted)).entries).toEqual([]);
  });

  it("exports the ledger as a spreadsheet", async () => {
    await upload(png("cafe.png"), png("uber.png"));
    const res = await app.request(`/api/sessions/${sessionId}/export`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    );
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="Invoice_Report.xlsx"');

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(await res.arrayBuffer());
    const sheet = workbook.getWorksheet("Invoices");
    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(2).getCell(2).value).toBe("Cafe Nero");
    expect(sheet?.getRow(3).getCell(2).value).toBe("Uber");
  });

  it("returns 404 for unknown sessions and entries", async () => {
    expect((await app.request("/api/sessions/unknown")).status).toBe(404);
    expect((await patch("unknown", { field: "vendor", value: "X" })).status).toBe(404);

    const res = await app.request("/api/sessions/unknown/export");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Session unknown not found" });
  });

  it("discards sessions", async () => {
    const res = await app.request(`/api/sessions/${sessionId}`, { method: "DELETE" });
    expect(res.status).toBe(204);
    expect((await app.request(`/api/sessions/${sessionId}`)).status).toBe(404);
  });
});
