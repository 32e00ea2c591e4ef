import type { Organization, OrganizationResult, ScoredDocument } from "../documents/types.js";

export const OUTPUT_COLUMNS = ["ID", "NAME", "TYPE", "SRC", "REFYEAR"] as const;

export type OutputRow = Record<(typeof OUTPUT_COLUMNS)[number], string>;

/**
 * Splits CSV content into records. Quote state carries across line breaks,
 * so a quoted cell may contain the delimiter, `""` or a newline.
 */
export function parseCsvRecords(content: string, delimiter = ","): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (quoted) {
      if (ch === '"' && content[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === delimiter) {
      record.push(current.trim());
      current = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && content[i + 1] === "\n") i++;
      record.push(current.trim());
      records.push(record);
      record = [];
      current = "";
    } else {
      current += ch;
    }
  }

  if (current.length > 0 || record.length > 0) {
    record.push(current.trim());
    records.push(record);
  }
  return records;
}

export function parseCsvLine(line: string, delimiter = ","): string[] {
  return parseCsvRecords(line, delimiter)[0] ?? [""];
}

/**
 * Reads the organizations to process from a CSV with ID and NAME columns.
 * Repeated IDs collapse into one organization, keeping the first name seen.
 */
export function readOrganizations(content: string): Organization[] {
  const records = parseCsvRecords(content.replace(/^\uFEFF/, "")).filter((record) =>
    record.some((cell) => cell.length > 0)
  );
  if (records.length === 0) return [];

  const headers = records[0].map((h) => h.toUpperCase());
  const idIndex = headers.indexOf("ID");
  const nameIndex = headers.indexOf("NAME");
  if (idIndex === -1 || nameIndex === -1) {
    throw new Error("Input CSV must have ID and NAME columns");
  }

  const organizations = new Map<string, Organization>();
  for (const cells of records.slice(1)) {
    const id = cells[idIndex] ?? "";
    const name = cells[nameIndex] ?? "";
    if (!id || organizations.has(id)) continue;
    organizations.set(id, { id, name });
  }

  return [...organizations.values()];
}

function toRow(
  org: Organization,
  type: "FIN_REP" | "OTHER",
  doc: ScoredDocument | null
): OutputRow {
  return {
    ID: org.id,
    NAME: org.name,
    TYPE: type,
    SRC: doc?.url ?? "",
    REFYEAR: doc?.refYear != null ? String(doc.refYear) : "",
  };
}

/** Exactly six rows: the primary report, then five alternates. */
export function toOutputRows(org: Organization, result: OrganizationResult): OutputRow[] {
  return [
    toRow(org, "FIN_REP", result.primary),
    ...result.alternates.map((doc) => toRow(org, "OTHER", doc)),
  ];
}

function escapeCell(value: string, delimiter: string): string {
  if (value.includes(delimiter) || /["\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(rows: OutputRow[], delimiter = ";"): string {
  const lines = [
    OUTPUT_COLUMNS.join(delimiter),
    ...rows.map((row) =>
      OUTPUT_COLUMNS.map((column) => escapeCell(row[column], delimiter)).join(delimiter)
    ),
  ];
  return `${lines.join("\n")}\n`;
}
