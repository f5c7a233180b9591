/**
 * Parse an indicator table (.xlsx or .csv): first worksheet, first row = headers.
 * Produces unvalidated record inputs; the engine validates and rejects bad rows.
 */

import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { dlog } from "@/lib/debug";

export type ParseWorkbookResult = {
  headers: string[];
  rows: Record<string, unknown>[];
};

/** Record-shaped input before validation. */
export type IndicatorInput = Record<string, unknown>;

function isRowEmpty(cells: unknown[]): boolean {
  return cells.every((c) => c === undefined || c === null || String(c).trim() === "");
}

/**
 * Parse first worksheet of a workbook buffer.
 * - Rows = objects keyed by header
 * - Completely empty rows are omitted
 */
export function parseIndicatorWorkbook(data: Uint8Array): ParseWorkbookResult {
  const workbook = XLSX.read(data, { type: "array", raw: true });
  const firstSheetName = workbook.SheetNames[0];
  if (!firstSheetName) {
    throw new Error("Workbook has no worksheets");
  }
  const sheet = workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new Error("First worksheet could not be read");
  }
  // header: 1 => array of arrays; first row = headers
  const raw = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: false,
    dateNF: "yyyy-mm-dd",
  });

  if (!raw.length) {
    return { headers: [], rows: [] };
  }

  const headerRow = raw[0] ?? [];
  const headers = headerRow.map((h, j) => String(h ?? "").trim() || `Column${j}`);

  const rows: Record<string, unknown>[] = [];
  for (let i = 1; i < raw.length; i++) {
    const cellRow = raw[i] ?? [];
    if (isRowEmpty(cellRow)) continue;
    const row: Record<string, unknown> = {};
    headers.forEach((key, j) => {
      const value = cellRow[j];
      row[key] = value === undefined || value === null ? "" : value;
    });
    rows.push(row);
  }

  dlog("import", `parsed ${rows.length} rows from sheet "${firstSheetName}"`);
  return { headers, rows };
}

/** Lowercase, accents stripped, non-alphanumerics removed: "Crimes (total)" → "crimestotal". */
export function normalizeHeader(header: string): string {
  return header
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
}

const FIELD_ALIASES: Record<string, readonly string[]> = {
  neighborhoodId: ["neighborhoodid", "neighborhood", "bairro", "district"],
  period: ["period", "periodo", "date", "data", "month", "mes"],
  year: ["year", "ano"],
  periodIndex: ["periodindex", "index"],
  crimeCount: ["crimecount", "crimes", "totalcrimes"],
  deathsInIntervention: ["deathsinintervention", "deaths", "mortes", "mortesintervencao"],
  arrests: ["arrests", "prisoes"],
  weaponsSeized: ["weaponsseized", "weapons", "armasapreendidas"],
  drugsSeizedKg: ["drugsseizedkg", "drugskg", "drogaskg"],
  officersInvolved: ["officersinvolved", "officers", "policiais"],
  operationType: ["operationtype", "operation", "tipooperacao"],
};

const NUMERIC_FIELDS = [
  "crimeCount",
  "deathsInIntervention",
  "arrests",
  "weaponsSeized",
  "drugsSeizedKg",
  "officersInvolved",
] as const;

/** Numeric strings (decimal comma accepted) become numbers; anything else is left for validation to reject. */
function toNumber(value: unknown): unknown {
  if (typeof value === "number") return value;
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (trimmed === "") return undefined;
  const normalized = /^-?\d+,\d+$/.test(trimmed) ? trimmed.replace(",", ".") : trimmed;
  const n = Number(normalized);
  return Number.isFinite(n) ? n : value;
}

function pick(row: Record<string, unknown>, lookup: Map<string, string>, field: string): unknown {
  for (const alias of FIELD_ALIASES[field] ?? []) {
    const header = lookup.get(alias);
    if (header !== undefined) return row[header];
  }
  return undefined;
}

/**
 * Maps parsed rows to record inputs using header aliases.
 * Explicit year + index columns win over a period/date column. A blank operation means "none".
 */
export function rowsToIndicatorInputs(parsed: ParseWorkbookResult): IndicatorInput[] {
  const lookup = new Map<string, string>();
  for (const h of parsed.headers) {
    const key = normalizeHeader(h);
    if (!lookup.has(key)) lookup.set(key, h);
  }

  return parsed.rows.map((row) => {
    const input: IndicatorInput = {};
    const id = pick(row, lookup, "neighborhoodId");
    input.neighborhoodId = typeof id === "string" ? id.trim() : id;

    const year = toNumber(pick(row, lookup, "year"));
    const index = toNumber(pick(row, lookup, "periodIndex"));
    if (typeof year === "number" && typeof index === "number") {
      input.period = { year, index };
    } else {
      const period = pick(row, lookup, "period");
      input.period = typeof period === "string" ? period.trim() : period;
    }

    for (const field of NUMERIC_FIELDS) {
      input[field] = toNumber(pick(row, lookup, field));
    }

    const op = pick(row, lookup, "operationType");
    const opText = op === undefined || op === null ? "" : String(op).trim().toLowerCase();
    input.operationType = opText === "" ? "none" : opText;
    return input;
  });
}

/** Reads an indicator table file from disk. */
export function readIndicatorFile(path: string): IndicatorInput[] {
  return rowsToIndicatorInputs(parseIndicatorWorkbook(readFileSync(path)));
}
