import type { TemplateConfig } from "@sheet_relay/config-schema";
import type { AppEnv } from "./env";
import { clientApiTarget, dispatchPayload, isConfigured, type DispatchResult } from "./dispatch";
import { errorMessage } from "./errors";
import { RECORD_FIELDS, cellText, type SheetRecord } from "./record";
import type { SheetStore, SpreadsheetRef } from "./sheets";
import { documentPayloadFor } from "./templates";

export const DEFAULT_BULK_WORKSHEET = "Products";

export type BulkReport = {
  status: "processing_complete";
  message: string;
  records_processed: number;
  records_sent_successfully: number;
  records_failed: number;
};

export type RelayLog = (message: string) => void;

/**
 * Builds and sends each record in order. One record's rejection or failure
 * never stops the ones after it.
 */
export async function relayRecords<P>(
  records: SheetRecord[],
  build: (record: SheetRecord) => P | null,
  send: (payload: P) => Promise<DispatchResult>,
  log: RelayLog = console.log
): Promise<BulkReport> {
  let sent = 0;
  let failed = 0;

  for (const [index, record] of records.entries()) {
    const label = `record ${index + 1} (${cellText(record[RECORD_FIELDS.phone]) || "N/A"})`;

    try {
      const payload = build(record);
      if (payload === null) {
        log(`Skipping ${label}: missing required fields`);
        failed++;
        continue;
      }

      const result = await send(payload);
      if (result.outcome === "success") {
        log(`SUCCESS: ${label} sent, status ${result.statusCode}`);
        sent++;
      } else if (result.outcome === "failure" && result.statusCode !== undefined) {
        log(`FAILURE: ${label} rejected with status ${result.statusCode}`);
        failed++;
      } else {
        log(`FAILURE: ${label} not sent: ${result.error || "unknown error"}`);
        failed++;
      }
    } catch (error) {
      log(`FAILURE: ${label} raised ${errorMessage(error)}`);
      failed++;
    }
  }

  return {
    status: "processing_complete",
    message: "Sheet data fetched and processing initiated.",
    records_processed: records.length,
    records_sent_successfully: sent,
    records_failed: failed
  };
}

export type SheetRelayResult =
  | { ok: true; report: BulkReport }
  | { ok: false; reason: "config" | "fetch" };

export function bulkSpreadsheetRef(env: AppEnv): SpreadsheetRef {
  return env.sheets.spreadsheetId
    ? { id: env.sheets.spreadsheetId }
    : { name: env.sheets.spreadsheetName };
}

/** Fetches the whole worksheet and relays it with the document template. */
export async function relaySheet(
  env: AppEnv,
  templates: TemplateConfig,
  store: SheetStore,
  log: RelayLog = console.log
): Promise<SheetRelayResult> {
  const target = clientApiTarget(env);
  if (!isConfigured(target)) {
    return { ok: false, reason: "config" };
  }

  const worksheet = env.sheets.worksheetName || DEFAULT_BULK_WORKSHEET;
  const records = await store.fetchRecords(bulkSpreadsheetRef(env), worksheet);
  // An empty worksheet is reported the same way as an unreadable one.
  if (records === null || records.length === 0) {
    return { ok: false, reason: "fetch" };
  }

  log(`Fetched ${records.length} records from "${worksheet}"`);

  const report = await relayRecords(
    records,
    (record) => documentPayloadFor(templates.documentTemplate, record),
    (payload) => dispatchPayload(target, payload, { timeoutMs: env.dispatchTimeoutMs }),
    log
  );

  return { ok: true, report };
}
