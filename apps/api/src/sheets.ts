import { google } from "googleapis";
import type { AppEnv } from "./env";
import {
  CredentialsError,
  parseServiceAccountKey,
  withCredentialFile,
  type ServiceAccountKey
} from "./credentials";
import { errorMessage } from "./errors";
import { cellText, type SheetRecord } from "./record";

const SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/drive.readonly"
];

export class SpreadsheetNotFoundError extends Error {
  constructor(name: string) {
    super(`Spreadsheet "${name}" not found or not shared with the service account`);
    this.name = "SpreadsheetNotFoundError";
  }
}

export class WorksheetNotFoundError extends Error {
  constructor(worksheet: string, spreadsheetId: string) {
    super(`Worksheet "${worksheet}" not found in spreadsheet ${spreadsheetId}`);
    this.name = "WorksheetNotFoundError";
  }
}

export class SheetHeaderError extends Error {
  constructor(duplicates: string[]) {
    super(`Header row is not unique: ${duplicates.join(", ")}`);
    this.name = "SheetHeaderError";
  }
}

export type SpreadsheetRef = { id: string } | { name: string };

export type CredentialSource = { keyFile: string } | { credentials: ServiceAccountKey };

/** The slice of the Sheets and Drive APIs the relay needs. */
export interface SheetClient {
  findSpreadsheetByName(name: string): Promise<string | null>;
  listWorksheets(spreadsheetId: string): Promise<string[]>;
  readValues(spreadsheetId: string, range: string): Promise<unknown[][]>;
  appendRow(spreadsheetId: string, range: string, values: string[]): Promise<void>;
}

export type SheetsConnector = (source: CredentialSource) => Promise<SheetClient>;

export const connectGoogleSheets: SheetsConnector = async (source) => {
  const auth =
    "keyFile" in source
      ? new google.auth.GoogleAuth({ keyFile: source.keyFile, scopes: SCOPES })
      : new google.auth.GoogleAuth({
          credentials: {
            client_email: source.credentials.client_email,
            private_key: source.credentials.private_key
          },
          scopes: SCOPES
        });

  // Loads and caches the credentials now, while a key file still exists.
  await auth.getClient();

  const sheets = google.sheets({ version: "v4", auth });
  const drive = google.drive({ version: "v3", auth });

  return {
    async findSpreadsheetByName(name) {
      const escaped = name.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
      const response = await drive.files.list({
        q: `name = '${escaped}' and mimeType = 'application/vnd.google-apps.spreadsheet' and trashed = false`,
        fields: "files(id, name)",
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true
      });
      return response.data.files?.[0]?.id ?? null;
    },

    async listWorksheets(spreadsheetId) {
      const response = await sheets.spreadsheets.get({
        spreadsheetId,
        fields: "sheets.properties.title"
      });
      return (response.data.sheets || [])
        .map((sheet) => sheet.properties?.title)
        .filter((title): title is string => typeof title === "string");
    },

    async readValues(spreadsheetId, range) {
      const response = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        majorDimension: "ROWS",
        valueRenderOption: "FORMATTED_VALUE"
      });
      return response.data.values ?? [];
    },

    async appendRow(spreadsheetId, range, values) {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: [values] }
      });
    }
  };
};

/** Quotes a worksheet title for A1 notation. */
export function worksheetRange(worksheet: string, cells?: string) {
  const quoted = `'${worksheet.replace(/'/g, "''")}'`;
  return cells ? `${quoted}!${cells}` : quoted;
}

function describeRef(ref: SpreadsheetRef) {
  return "id" in ref ? `id ${ref.id}` : `"${ref.name}"`;
}

/** First row is the header; every following row becomes a record. */
export function rowsToRecords(rows: unknown[][]): SheetRecord[] {
  if (rows.length === 0) return [];

  const header = rows[0].map((cell) => cellText(cell));
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const key of header) {
    if (!key) continue;
    if (seen.has(key)) duplicates.add(key);
    seen.add(key);
  }
  if (duplicates.size > 0) {
    throw new SheetHeaderError([...duplicates]);
  }

  return rows.slice(1).map((row) => {
    const record: SheetRecord = {};
    header.forEach((key, index) => {
      if (!key) return;
      record[key] = cellText(row[index]);
    });
    return record;
  });
}

export type SheetStoreOptions = Pick<
  AppEnv["sheets"],
  "credentials" | "credentialsMode" | "credentialsTmpDir"
>;

export type SheetStore = {
  fetchRecords(ref: SpreadsheetRef, worksheet: string): Promise<SheetRecord[] | null>;
  appendRecord(ref: SpreadsheetRef, worksheet: string, record: SheetRecord): Promise<boolean>;
};

export function createSheetStore(
  options: SheetStoreOptions,
  connect: SheetsConnector = connectGoogleSheets
): SheetStore {
  async function withClient<T>(use: (client: SheetClient) => Promise<T>): Promise<T> {
    const raw = options.credentials;
    if (!raw) {
      throw new CredentialsError("GOOGLE_CREDENTIALS environment variable not set");
    }

    const key = parseServiceAccountKey(raw);

    if (options.credentialsMode === "file") {
      return withCredentialFile(raw, options.credentialsTmpDir, async (keyFile) =>
        use(await connect({ keyFile }))
      );
    }

    return use(await connect({ credentials: key }));
  }

  async function openWorksheet(client: SheetClient, ref: SpreadsheetRef, worksheet: string) {
    const spreadsheetId = "id" in ref ? ref.id : await client.findSpreadsheetByName(ref.name);
    if (!spreadsheetId) {
      throw new SpreadsheetNotFoundError("name" in ref ? ref.name : "");
    }

    const worksheets = await client.listWorksheets(spreadsheetId);
    if (!worksheets.includes(worksheet)) {
      throw new WorksheetNotFoundError(worksheet, spreadsheetId);
    }

    return spreadsheetId;
  }

  return {
    async fetchRecords(ref, worksheet) {
      try {
        return await withClient(async (client) => {
          const spreadsheetId = await openWorksheet(client, ref, worksheet);
          const rows = await client.readValues(spreadsheetId, worksheetRange(worksheet));
          return rowsToRecords(rows);
        });
      } catch (error) {
        console.error(
          `Sheet read failed for ${describeRef(ref)} / "${worksheet}":`,
          errorMessage(error)
        );
        return null;
      }
    },

    async appendRecord(ref, worksheet, record) {
      try {
        return await withClient(async (client) => {
          const spreadsheetId = await openWorksheet(client, ref, worksheet);
          const headerRows = await client.readValues(spreadsheetId, worksheetRange(worksheet, "1:1"));
          const header = (headerRows[0] || []).map((cell) => cellText(cell));
          const values = header.map((key) => cellText(record[key]));

          await client.appendRow(spreadsheetId, worksheetRange(worksheet, "A1"), values);
          console.log(`Row appended to ${describeRef(ref)} / "${worksheet}"`);
          return true;
        });
      } catch (error) {
        console.error(
          `Sheet write failed for ${describeRef(ref)} / "${worksheet}":`,
          errorMessage(error)
        );
        return false;
      }
    }
  };
}
