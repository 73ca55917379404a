import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import cors from "cors";
import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import type { TemplateConfig } from "@sheet_relay/config-schema";
import type { AppEnv } from "./env";
import { dispatchPayload, isConfigured, whatsappTarget } from "./dispatch";
import { mapRecord } from "./record";
import { relaySheet } from "./relay";
import { createSheetStore, type SheetStore } from "./sheets";
import { buildBodyPayload, documentPayloadFor } from "./templates";

export const DEFAULT_SUBMIT_WORKSHEET = "Data";

const INVALID_BODY_MESSAGE = "Invalid JSON received or missing body.";

const RecordBodySchema = z.record(z.unknown());

const WebhookSchema = z.object({
  new_row_data: RecordBodySchema,
  row_index: z.unknown().optional()
});

export type AppDeps = {
  templates: TemplateConfig;
  sheetStore?: SheetStore;
};

function parseTrustProxy(value: string) {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  if (/^\d+$/.test(normalized)) return Number(normalized);
  return value;
}

function isAllowedOrigin(origin: string, allowList: string[]) {
  let host = "";
  let normalized = origin.toLowerCase();
  try {
    const url = new URL(origin);
    host = url.hostname.toLowerCase();
    normalized = url.origin.toLowerCase();
  } catch {
    return false;
  }

  return allowList.some((raw) => {
    const allowed = raw.toLowerCase();
    if (allowed === "*") return true;
    if (allowed.startsWith("*.")) return host.endsWith(allowed.slice(1));
    if (allowed.startsWith("http://") || allowed.startsWith("https://")) return normalized === allowed;
    return host === allowed;
  });
}

// body-parser rejections (bad JSON, oversized or badly encoded bodies) carry a 4xx status.
function isBodyParseError(error: unknown) {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  );
}

export function createApp(env: AppEnv, deps: AppDeps) {
  const app = express();
  const sheetStore = deps.sheetStore ?? createSheetStore(env.sheets);
  const { templates } = deps;

  if (env.trustProxy) {
    app.set("trust proxy", parseTrustProxy(env.trustProxy));
  }

  app.use(
    cors({
      origin: (origin, callback) => {
        // Server-to-server callers (Apps Script, providers) send no Origin.
        if (!origin || isAllowedOrigin(origin, env.corsOrigins)) {
          return callback(null, true);
        }
        return callback(null, false);
      }
    })
  );
  app.use(express.json({ limit: "1mb" }));
  app.use(
    rateLimit({
      windowMs: env.rateLimitWindowMs,
      max: env.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      // Sheet edits fire one webhook per row; a bulk paste must not be throttled.
      skip: (req) => req.path === "/webhook"
    })
  );

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/sheet-update", async (_req, res) => {
    const requestId = uuidv4();
    console.log(`[${requestId}] Sheet update notification received`);

    try {
      const result = await relaySheet(env, templates, sheetStore, (message) =>
        console.log(`[${requestId}] ${message}`)
      );

      if (!result.ok && result.reason === "config") {
        console.error(`[${requestId}] CLIENT_API_ENDPOINT or CLIENT_API_KEY is not set`);
        return res.status(500).json({ status: "error", message: "Server configuration error." });
      }

      if (!result.ok) {
        return res
          .status(500)
          .json({ status: "error", message: "Failed to retrieve data from Google Sheets." });
      }

      const { report } = result;
      console.log(
        `[${requestId}] Done: ${report.records_sent_successfully} sent, ${report.records_failed} failed`
      );
      return res.status(200).json(report);
    } catch (error) {
      console.error(`[${requestId}] Sheet update error`, error);
      return res.status(500).json({ status: "error", message: "Internal server error." });
    }
  });

  app.post("/webhook", async (req, res) => {
    const requestId = uuidv4();

    try {
      const parseResult = WebhookSchema.safeParse(req.body);
      if (!parseResult.success) {
        return res
          .status(400)
          .json({ status: "error", message: "Invalid JSON received or missing new_row_data." });
      }

      const { new_row_data: row, row_index: rowIndex } = parseResult.data;
      console.log(`[${requestId}] Webhook received for row ${JSON.stringify(rowIndex ?? null)}`);

      const target = whatsappTarget(env);
      if (!isConfigured(target)) {
        console.error(`[${requestId}] WHATSAPP_ACCESS_TOKEN or WHATSAPP_PHONE_NUMBER_ID is not set`);
        return res.status(500).json({ status: "error", message: "Server configuration error." });
      }

      const mapped = mapRecord(row);
      if (!mapped.ok) {
        console.log(`[${requestId}] Rejected row, missing ${mapped.missing.join(", ")}`);
        return res.status(400).json({
          status: "error",
          message: "Missing required data (Mobile No / Application ID)."
        });
      }

      const payload = buildBodyPayload(templates.bodyTemplate, mapped.record);
      const result = await dispatchPayload(target, payload, { timeoutMs: env.dispatchTimeoutMs });

      switch (result.outcome) {
        case "success":
          console.log(`[${requestId}] Message sent, status ${result.statusCode}`);
          return res.status(result.statusCode).json({
            status: "success",
            message: "Message sent.",
            row_index: rowIndex ?? null,
            provider_status: result.statusCode
          });
        case "config_error":
          console.error(`[${requestId}] ${result.error}`);
          return res.status(500).json({ status: "error", message: "Server configuration error." });
        case "failure":
          if (result.statusCode === undefined) {
            console.error(`[${requestId}] Messaging provider unreachable: ${result.error}`);
            return res
              .status(500)
              .json({ status: "error", message: "Failed to reach messaging provider." });
          }
          console.error(`[${requestId}] Messaging provider returned status ${result.statusCode}`);
          return res.status(result.statusCode).json({
            status: "error",
            message: `Messaging provider returned status ${result.statusCode}.`,
            row_index: rowIndex ?? null,
            provider_status: result.statusCode,
            provider_response: result.responseBody ?? ""
          });
      }
    } catch (error) {
      console.error(`[${requestId}] Webhook error`, error);
      return res.status(500).json({ status: "error", message: "Internal server error." });
    }
  });

  app.post("/submit-data", async (req, res) => {
    const requestId = uuidv4();

    try {
      const parseResult = RecordBodySchema.safeParse(req.body);
      if (!parseResult.success || Object.keys(parseResult.data).length === 0) {
        return res.status(400).json({ status: "error", message: INVALID_BODY_MESSAGE });
      }

      const spreadsheetId = env.sheets.spreadsheetId;
      if (!spreadsheetId) {
        return res
          .status(500)
          .json({ status: "error", message: "Server configuration missing SHEET_ID." });
      }

      const record = parseResult.data;
      console.log(`[${requestId}] Submission received with fields ${Object.keys(record).join(", ")}`);

      const worksheet = env.sheets.worksheetName || DEFAULT_SUBMIT_WORKSHEET;
      const written = await sheetStore.appendRecord({ id: spreadsheetId }, worksheet, record);

      const payload = documentPayloadFor(templates.documentTemplate, record);
      if (payload === null) {
        return res.status(400).json({
          status: "error",
          message: "Failed to construct WhatsApp payload (missing mobile/app ID)."
        });
      }

      return res.status(200).json({ ...payload, sheet_write_status: written ? "success" : "failure" });
    } catch (error) {
      console.error(`[${requestId}] Submission error`, error);
      return res.status(500).json({ status: "error", message: "Internal server error." });
    }
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (isBodyParseError(error)) {
      return res.status(400).json({ status: "error", message: INVALID_BODY_MESSAGE });
    }
    console.error("Unhandled request error", error);
    return res.status(500).json({ status: "error", message: "Internal server error." });
  });

  return app;
}
