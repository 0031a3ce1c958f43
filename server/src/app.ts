import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import { serveStatic } from "@hono/node-server/serve-static";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import {
  INVOICE_CATEGORIES,
  INVOICE_FIELDS,
  type AppConfigResponse,
  type EditRejectedResponse,
  type SessionView,
  type UploadResponse,
} from "shared";
import { logger } from "./utils/logger";
import {
  EntryNotFoundError,
  ExportFailedError,
  SessionNotFoundError,
} from "./services/errors";
import { EXPORT_FILE_NAME, XLSX_MIME_TYPE, exportLedgerToXlsx } from "./services/export";
import type { InvoiceExtractor } from "./services/gen-ai";
import { ACCEPTED_MIME_TYPES } from "./services/intake";
import { processInvoiceUploads } from "./services/invoice";
import { addBlankEntry, appendEntries, deleteEntry, editField } from "./services/ledger";
import type { Session, SessionStore } from "./services/session-store";
import { summarizeLedger } from "./services/summary";

export interface AppDeps {
  sessions: SessionStore;
  extractor: InvoiceExtractor;
  instructionTemplate: string;
  maxFileSize: number;
  /** Directory holding the built client; nothing is served when omitted */
  staticRoot?: string;
}

const toSessionView = (session: Session): SessionView => ({
  sessionId: session.id,
  entries: [...session.ledger],
  summary: summarizeLedger(session.ledger),
});

const uploadSchema = z.object({
  files: z
    .union([z.instanceof(File), z.array(z.instanceof(File)).nonempty()])
    .transform((files) => (Array.isArray(files) ? files : [files])),
});

const editSchema = z.object({
  field: z.enum(INVOICE_FIELDS),
  value: z.union([z.string(), z.number(), z.null()]),
});

export const createApp = ({
  sessions,
  extractor,
  instructionTemplate,
  maxFileSize,
  staticRoot,
}: AppDeps) => {
  const app = new Hono();

  app.use(requestLogger((message, ...rest) => logger.info(message, ...rest)));
  app.use("/api/*", cors());

  app.onError((err, c) => {
    if (err instanceof SessionNotFoundError || err instanceof EntryNotFoundError) {
      return c.json({ error: err.message }, 404);
    }
    logger.error("Unhandled error:", err);
    return c.json({ error: err.message || "An unknown error occurred." }, 500);
  });

  app.get("/healthz", (c) => c.text("OK", 200));

  app.get("/api/config", (c) => {
    const config: AppConfigResponse = {
      categories: [...INVOICE_CATEGORIES],
      acceptedMimeTypes: ACCEPTED_MIME_TYPES,
      maxFileSize,
    };
    return c.json(config, 200);
  });

  app.post("/api/sessions", (c) => {
    const session = sessions.create();
    logger.info("Started session", session.id);
    return c.json(toSessionView(session), 201);
  });

  app.get("/api/sessions/:sessionId", (c) => {
    const session = sessions.get(c.req.param("sessionId"));
    return c.json(toSessionView(session), 200);
  });

  app.delete("/api/sessions/:sessionId", (c) => {
    sessions.discard(c.req.param("sessionId"));
    return c.body(null, 204);
  });

  app.post(
    "/api/sessions/:sessionId/invoices",
    zValidator("form", uploadSchema, (result, c) => {
      if (!result.success) {
        return c.json({ error: "Upload at least one image in the 'files' field" }, 400);
      }
    }),
    async (c) => {
      const sessionId = c.req.param("sessionId");
      // Fail before spending model calls on an unknown session
      sessions.get(sessionId);

      const { files } = c.req.valid("form");
      const { outcomes, entries } = await processInvoiceUploads(files, {
        extractor,
        instructionTemplate,
        maxFileSize,
      });
      const session = sessions.update(sessionId, appendEntries(sessions.get(sessionId).ledger, entries));
      logger.info("Processed invoice batch", {
        sessionId,
        files: files.length,
        added: entries.length,
      });

      const response: UploadResponse = { outcomes, session: toSessionView(session) };
      return c.json(response, 200);
    },
  );

  app.post("/api/sessions/:sessionId/entries", (c) => {
    const sessionId = c.req.param("sessionId");
    const { ledger } = addBlankEntry(sessions.get(sessionId).ledger);
    return c.json(toSessionView(sessions.update(sessionId, ledger)), 201);
  });

  app.patch(
    "/api/sessions/:sessionId/entries/:entryId",
    zValidator("json", editSchema),
    (c) => {
      const sessionId = c.req.param("sessionId");
      const entryId = c.req.param("entryId");
      const { field, value } = c.req.valid("json");

      const result = editField(sessions.get(sessionId).ledger, entryId, field, value);
      if (!result.ok) {
        logger.warn("Edit rejected", { sessionId, entryId, field, reason: result.error.message });
        const response: EditRejectedResponse = {
          error: result.error.message,
          field: result.error.field,
          session: toSessionView(sessions.get(sessionId)),
        };
        return c.json(response, 422);
      }

      return c.json(toSessionView(sessions.update(sessionId, result.ledger)), 200);
    },
  );

  app.delete("/api/sessions/:sessionId/entries/:entryId", (c) => {
    const sessionId = c.req.param("sessionId");
    const ledger = deleteEntry(sessions.get(sessionId).ledger, c.req.param("entryId"));
    return c.json(toSessionView(sessions.update(sessionId, ledger)), 200);
  });

  app.get("/api/sessions/:sessionId/export", async (c) => {
    const session = sessions.get(c.req.param("sessionId"));
    try {
      const file = await exportLedgerToXlsx(session.ledger);
      return new Response(file, {
        status: 200,
        headers: {
          "content-type": XLSX_MIME_TYPE,
          "content-disposition": `attachment; filename="${EXPORT_FILE_NAME}"`,
        },
      });
    } catch (err) {
      if (err instanceof ExportFailedError) {
        return c.json({ error: err.message }, 500);
      }
      throw err;
    }
  });

  if (staticRoot) {
    app.get("/*", serveStatic({ root: staticRoot }));
  }

  return app;
};
