import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import {
  SheetHeaderError,
  createSheetStore,
  rowsToRecords,
  worksheetRange,
  type CredentialSource,
  type SheetClient,
  type SheetStoreOptions
} from "../src/sheets";
import { MemorySheetClient, TEST_CREDENTIALS } from "./helpers";

const header = ["Mobile No", "Application ID", "Applicant Name", "Application Type (Certificate Name)"];

describe("rowsToRecords", () => {
  it("keys each row by the header and pads short rows", () => {
    const records = rowsToRecords([
      header,
      ["98765 43210", "A100", "Asha", "Birth"],
      ["9876500000", "A101"]
    ]);

    expect(records).toEqual([
      {
        "Mobile No": "98765 43210",
        "Application ID": "A100",
        "Applicant Name": "Asha",
        "Application Type (Certificate Name)": "Birth"
      },
      {
        "Mobile No": "9876500000",
        "Application ID": "A101",
        "Applicant Name": "",
        "Application Type (Certificate Name)": ""
      }
    ]);
  });

  it("skips columns without a header", () => {
    expect(rowsToRecords([["Mobile No", "", "Application ID"], ["1", "x", "2"]])).toEqual([
      { "Mobile No": "1", "Application ID": "2" }
    ]);
  });

  it("returns no records for an empty or header-only sheet", () => {
    expect(rowsToRecords([])).toEqual([]);
    expect(rowsToRecords([header])).toEqual([]);
  });

  it("keys records by the header text exactly as written", () => {
    expect(rowsToRecords([["Mobile No ", "Application ID"], ["1", "2"]])).toEqual([
      { "Mobile No ": "1", "Application ID": "2" }
    ]);
  });

  it("rejects a repeated header", () => {
    expect(() => rowsToRecords([["Mobile No", "Mobile No"], ["1", "2"]])).toThrow(SheetHeaderError);
  });
});

describe("worksheetRange", () => {
  it("quotes titles for A1 notation", () => {
    expect(worksheetRange("Products")).toBe("'Products'");
    expect(worksheetRange("Bob's Data", "1:1")).toBe("'Bob''s Data'!1:1");
  });
});

describe("createSheetStore", () => {
  let baseDir: string;
  let client: MemorySheetClient;
  let connect: Mock<[CredentialSource], Promise<SheetClient>>;

  function options(overrides: Partial<SheetStoreOptions> = {}): SheetStoreOptions {
    return {
      credentials: TEST_CREDENTIALS,
      credentialsMode: "memory",
      credentialsTmpDir: baseDir,
      ...overrides
    };
  }

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "sheet-store-"));
    client = new MemorySheetClient().addSpreadsheet("sheet-123", "My Product Inventory Sheet", {
      Products: [header, ["98765 43210", "A100", "Asha", "Birth"]],
      Data: [[...header, "Notes"]]
    });
    connect = vi.fn(async (_source: CredentialSource): Promise<SheetClient> => client);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  it("fetches records from a spreadsheet found by name", async () => {
    const store = createSheetStore(options(), connect);

    const records = await store.fetchRecords({ name: "My Product Inventory Sheet" }, "Products");

    expect(records).toEqual([
      {
        "Mobile No": "98765 43210",
        "Application ID": "A100",
        "Applicant Name": "Asha",
        "Application Type (Certificate Name)": "Birth"
      }
    ]);
    expect(client.reads).toEqual([{ spreadsheetId: "sheet-123", range: "'Products'" }]);
  });

  it("hands parsed credentials to the client in memory mode", async () => {
    const store = createSheetStore(options(), connect);
    await store.fetchRecords({ id: "sheet-123" }, "Products");

    expect(connect).toHaveBeenCalledWith({
      credentials: expect.objectContaining({
        client_email: "relay@test-project.example",
        private_key: "test-private-key"
      })
    });
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it("returns null without credentials and never connects", async () => {
    const store = createSheetStore(options({ credentials: undefined }), connect);

    expect(await store.fetchRecords({ id: "sheet-123" }, "Products")).toBeNull();
    expect(connect).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith(
      "Sheet read failed for id sheet-123 / \"Products\":",
      "GOOGLE_CREDENTIALS environment variable not set"
    );
  });

  it("returns null for malformed credentials", async () => {
    const store = createSheetStore(options({ credentials: "{oops" }), connect);
    expect(await store.fetchRecords({ id: "sheet-123" }, "Products")).toBeNull();
    expect(connect).not.toHaveBeenCalled();
  });

  it("returns null for an unknown spreadsheet name", async () => {
    const store = createSheetStore(options(), connect);
    expect(await store.fetchRecords({ name: "Elsewhere" }, "Products")).toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      "Sheet read failed for \"Elsewhere\" / \"Products\":",
      "Spreadsheet \"Elsewhere\" not found or not shared with the service account"
    );
  });

  it("returns null for an unknown worksheet", async () => {
    const store = createSheetStore(options(), connect);
    expect(await store.fetchRecords({ id: "sheet-123" }, "Missing")).toBeNull();
    expect(console.error).toHaveBeenCalledWith(
      "Sheet read failed for id sheet-123 / \"Missing\":",
      "Worksheet \"Missing\" not found in spreadsheet sheet-123"
    );
  });

  it("writes the key to a file that is gone after the read in file mode", async () => {
    let keyFile = "";
    connect.mockImplementationOnce(async (source) => {
      if (!("keyFile" in source)) throw new Error("expected a key file");
      keyFile = source.keyFile;
      expect(fs.readFileSync(keyFile, "utf8")).toBe(TEST_CREDENTIALS);
      return client;
    });
    const store = createSheetStore(options({ credentialsMode: "file" }), connect);

    const records = await store.fetchRecords({ id: "sheet-123" }, "Products");

    expect(records).toHaveLength(1);
    expect(keyFile.startsWith(baseDir)).toBe(true);
    expect(fs.existsSync(keyFile)).toBe(false);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it("leaves no credential file behind when authentication fails", async () => {
    connect.mockRejectedValueOnce(new Error("invalid_grant: Invalid JWT Signature."));
    const store = createSheetStore(options({ credentialsMode: "file" }), connect);

    expect(await store.fetchRecords({ id: "sheet-123" }, "Products")).toBeNull();
    expect(connect).toHaveBeenCalledTimes(1);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it("appends a row in header order", async () => {
    const store = createSheetStore(options(), connect);

    const written = await store.appendRecord({ id: "sheet-123" }, "Data", {
      "Application ID": 42,
      "Mobile No": "98765 43210",
      Unrelated: "ignored"
    });

    expect(written).toBe(true);
    expect(client.appended).toEqual([
      {
        spreadsheetId: "sheet-123",
        range: "'Data'!A1",
        values: ["98765 43210", "42", "", "", ""]
      }
    ]);
    expect(client.reads).toEqual([{ spreadsheetId: "sheet-123", range: "'Data'!1:1" }]);
  });

  it("reports a failed append without throwing", async () => {
    const store = createSheetStore(options(), connect);
    expect(await store.appendRecord({ id: "other-sheet" }, "Data", { "Mobile No": "1" })).toBe(false);
    expect(client.appended).toEqual([]);
  });

  it("cleans up the credential file after an append in file mode", async () => {
    const store = createSheetStore(options({ credentialsMode: "file" }), connect);
    expect(await store.appendRecord({ id: "sheet-123" }, "Data", { "Mobile No": "1" })).toBe(true);
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });
});
