import { loadEnv, type AppEnv } from "../src/env";
import type { SheetClient } from "../src/sheets";

export const TEST_CREDENTIALS = JSON.stringify({
  type: "service_account",
  client_email: "relay@test-project.example",
  private_key: "test-private-key"
});

export function testEnv(overrides: NodeJS.ProcessEnv = {}): AppEnv {
  return loadEnv({
    GOOGLE_CREDENTIALS: TEST_CREDENTIALS,
    CLIENT_API_ENDPOINT: "https://provider.test/send",
    CLIENT_API_KEY: "test-client-key",
    WHATSAPP_ACCESS_TOKEN: "test-whatsapp-token",
    WHATSAPP_PHONE_NUMBER_ID: "1234567890",
    SHEET_ID: "sheet-123",
    ...overrides
  });
}

export function jsonResponse(status: number, body: unknown = {}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

type MemorySpreadsheet = {
  name: string;
  worksheets: Map<string, unknown[][]>;
};

/** In-process stand-in for the Sheets and Drive APIs. */
export class MemorySheetClient implements SheetClient {
  spreadsheets = new Map<string, MemorySpreadsheet>();
  appended: Array<{ spreadsheetId: string; range: string; values: string[] }> = [];
  reads: Array<{ spreadsheetId: string; range: string }> = [];

  addSpreadsheet(id: string, name: string, worksheets: Record<string, unknown[][]>) {
    this.spreadsheets.set(id, { name, worksheets: new Map(Object.entries(worksheets)) });
    return this;
  }

  async findSpreadsheetByName(name: string): Promise<string | null> {
    for (const [id, spreadsheet] of this.spreadsheets) {
      if (spreadsheet.name === name) return id;
    }
    return null;
  }

  async listWorksheets(spreadsheetId: string): Promise<string[]> {
    return [...this.spreadsheet(spreadsheetId).worksheets.keys()];
  }

  async readValues(spreadsheetId: string, range: string): Promise<unknown[][]> {
    this.reads.push({ spreadsheetId, range });
    const { title, cells } = parseRange(range);
    const rows = this.worksheet(spreadsheetId, title);
    return cells === "1:1" ? rows.slice(0, 1) : rows;
  }

  async appendRow(spreadsheetId: string, range: string, values: string[]): Promise<void> {
    const { title } = parseRange(range);
    this.worksheet(spreadsheetId, title).push(values);
    this.appended.push({ spreadsheetId, range, values });
  }

  private spreadsheet(spreadsheetId: string) {
    const spreadsheet = this.spreadsheets.get(spreadsheetId);
    if (!spreadsheet) {
      throw new Error(`Requested entity was not found: ${spreadsheetId}`);
    }
    return spreadsheet;
  }

  private worksheet(spreadsheetId: string, title: string) {
    const rows = this.spreadsheet(spreadsheetId).worksheets.get(title);
    if (!rows) {
      throw new Error(`Unable to parse range: ${title}`);
    }
    return rows;
  }
}

function parseRange(range: string) {
  const match = /^'((?:[^']|'')*)'(?:!(.+))?$/.exec(range);
  if (!match) {
    throw new Error(`Unexpected range ${range}`);
  }
  return { title: match[1].replace(/''/g, "'"), cells: match[2] };
}
