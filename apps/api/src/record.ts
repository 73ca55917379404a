/** A spreadsheet row, or an inbound request body, keyed by column header. */
export type SheetRecord = Record<string, unknown>;

/**
 * Column headers the mapper reads. These must match the spreadsheet header
 * row byte for byte.
 */
export const RECORD_FIELDS = {
  phone: "Mobile No",
  applicationId: "Application ID",
  applicantName: "Applicant Name",
  applicationType: "Application Type (Certificate Name)"
} as const;

export type RequiredField = typeof RECORD_FIELDS.phone | typeof RECORD_FIELDS.applicationId;

export type MappedRecord = {
  phone: string;
  applicationId: string;
  applicantName: string;
  applicationType: string;
};

export type MapResult =
  | { ok: true; record: MappedRecord }
  | { ok: false; reason: "missing_required_fields"; missing: RequiredField[] };

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value) ?? "";
}

export function normalizePhone(value: string) {
  return value.replace(/ /g, "");
}

function field(record: SheetRecord, key: string) {
  return Object.prototype.hasOwnProperty.call(record, key) ? cellText(record[key]) : "";
}

export function mapRecord(record: SheetRecord): MapResult {
  const mapped: MappedRecord = {
    phone: normalizePhone(field(record, RECORD_FIELDS.phone)),
    applicationId: field(record, RECORD_FIELDS.applicationId),
    applicantName: field(record, RECORD_FIELDS.applicantName),
    applicationType: field(record, RECORD_FIELDS.applicationType)
  };

  const missing: RequiredField[] = [];
  if (!mapped.phone) missing.push(RECORD_FIELDS.phone);
  if (!mapped.applicationId) missing.push(RECORD_FIELDS.applicationId);

  if (missing.length > 0) {
    return { ok: false, reason: "missing_required_fields", missing };
  }

  return { ok: true, record: mapped };
}
