import dotenv from "dotenv";
import fs from "fs";
import os from "os";
import path from "path";

export type CredentialsMode = "memory" | "file";

export type AppEnv = {
  port: number;
  configDir: string;
  trustProxy?: string;
  corsOrigins: string[];
  rateLimitWindowMs: number;
  rateLimitMax: number;
  dispatchTimeoutMs: number;
  sheets: {
    spreadsheetName: string;
    spreadsheetId?: string;
    worksheetName?: string;
    credentials?: string;
    credentialsMode: CredentialsMode;
    credentialsTmpDir: string;
  };
  clientApi: {
    endpoint?: string;
    key?: string;
  };
  whatsapp: {
    accessToken?: string;
    phoneNumberId?: string;
    baseUrl: string;
    apiVersion: string;
  };
};

/** Populates process.env from the repo-root .env, or the cwd one. */
export function loadDotenv() {
  const rootEnv = path.resolve(process.cwd(), "../../.env");
  if (fs.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
  } else {
    dotenv.config();
  }
}

function optional(value: string | undefined) {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function numberOr(value: string | undefined, fallback: number) {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseCredentialsMode(value: string | undefined): CredentialsMode {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === "memory") return "memory";
  if (normalized === "file") return "file";
  throw new Error(`GOOGLE_CREDENTIALS_MODE must be "memory" or "file", got "${value}"`);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return {
    port: numberOr(source.PORT, 4000),
    configDir: source.CONFIG_DIR || "../../configs",
    trustProxy: optional(source.TRUST_PROXY),
    corsOrigins: (source.CORS_ORIGINS || "")
      .split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    rateLimitWindowMs: numberOr(source.RATE_LIMIT_WINDOW_MS, 60_000),
    rateLimitMax: numberOr(source.RATE_LIMIT_MAX, 60),
    dispatchTimeoutMs: numberOr(source.DISPATCH_TIMEOUT_MS, 10_000),
    sheets: {
      spreadsheetName: optional(source.SHEET_NAME) || "My Product Inventory Sheet",
      spreadsheetId: optional(source.SHEET_ID),
      worksheetName: optional(source.WORKSHEET_NAME),
      credentials: optional(source.GOOGLE_CREDENTIALS),
      credentialsMode: parseCredentialsMode(source.GOOGLE_CREDENTIALS_MODE),
      credentialsTmpDir: optional(source.CREDENTIALS_TMP_DIR) || os.tmpdir()
    },
    clientApi: {
      endpoint: optional(source.CLIENT_API_ENDPOINT),
      key: optional(source.CLIENT_API_KEY)
    },
    whatsapp: {
      accessToken: optional(source.WHATSAPP_ACCESS_TOKEN),
      phoneNumberId: optional(source.WHATSAPP_PHONE_NUMBER_ID),
      baseUrl: (optional(source.WHATSAPP_API_BASE_URL) || "https://graph.facebook.com").replace(/\/+$/, ""),
      apiVersion: optional(source.WHATSAPP_API_VERSION) || "v19.0"
    }
  };
}
