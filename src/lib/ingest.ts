// src/lib/ingest.ts
import Papa from "papaparse";
import type { Cell, Row, Table } from "./types";
import { COLUMNS, TIMESTAMP_COLUMNS } from "./schema";

export class IngestError extends Error {
  readonly row?: number;

  constructor(message: string, row?: number) {
    super(message);
    this.name = "IngestError";
    this.row = row;
  }
}

// Papa error codes that mean the file is not usable as a table at all.
const FATAL_CODES = new Set(["MissingQuotes", "TooManyFields"]);

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

function toCell(v: unknown): Cell {
  if (v === undefined || v === null) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean" || v instanceof Date) return v;
  return String(v);
}

/** Parse CSV text into a table. Throws IngestError when the text is not tabular. */
export function parseCsv(text: string): Table {
  const res = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    // timestamps stay raw strings; coerceTimestamps owns their parsing
    dynamicTyping: (field) => !TIMESTAMP_COLUMNS.includes(String(field)),
  });

  const fatal = res.errors.find((e) => FATAL_CODES.has(e.code));
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : "";
    throw new IngestError(`Malformed CSV${where}: ${fatal.message}`, fatal.row);
  }

  const columns = (res.meta.fields ?? []).filter((c) => c !== "");
  if (columns.length === 0) throw new IngestError("No columns found in CSV header");

  const rows: Row[] = res.data.map((raw) => {
    const out: Row = {};
    for (const c of columns) out[c] = toCell(raw[c]);
    return out;
  });
  return { columns, rows };
}

/** ======================= Timestamps ======================= */

// YYYY-MM-DD with an optional time, and an optional Z or ±HH:MM offset after the time.
const TIMESTAMP_RE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|([+-])(\d{2}):?(\d{2}))?)?$/i;

const num = (s: string | undefined) => (s ? Number(s) : 0);

/**
 * Parse a timestamp cell. Values without an offset are kept as wall-clock time
 * in UTC, so calendar parts must be read with the getUTC* accessors.
 * Anything else yields null.
 */
export function parseTimestamp(v: Cell): Date | null {
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : v;
  if (typeof v !== "string") return null;
  const m = TIMESTAMP_RE.exec(v.trim());
  if (!m) return null;

  const y = num(m[1]), mo = num(m[2]), d = num(m[3]);
  const h = num(m[4]), mi = num(m[5]), sec = num(m[6]);
  const ms = m[7] ? Number(m[7].slice(0, 3).padEnd(3, "0")) : 0;
  if (h > 23 || mi > 59 || sec > 59) return null;

  const wall = Date.UTC(y, mo - 1, d, h, mi, sec, ms);
  const check = new Date(wall);
  // rejects rollovers such as 2019-02-30
  if (check.getUTCFullYear() !== y || check.getUTCMonth() !== mo - 1 || check.getUTCDate() !== d) return null;

  if (!m[9]) return check;
  const oh = num(m[10]), om = num(m[11]);
  if (oh > 23 || om > 59) return null;
  const sign = m[9] === "-" ? -1 : 1;
  return new Date(wall - sign * (oh * 60 + om) * 60_000);
}

export function coerceTimestamps(table: Table): Table {
  const present = TIMESTAMP_COLUMNS.filter((c) => table.columns.includes(c));
  if (present.length === 0) return table;
  const rows = table.rows.map((r) => {
    const out: Row = { ...r };
    for (const c of present) out[c] = parseTimestamp(r[c] ?? null);
    return out;
  });
  return { columns: [...table.columns], rows };
}

/** Adds pickup_hour / pickup_day / pickup_month when at least one pickup time parsed. */
export function deriveTimeFeatures(table: Table): Table {
  const src = COLUMNS.pickupTime;
  if (!table.columns.includes(src)) return table;
  if (!table.rows.some((r) => r[src] instanceof Date)) return table;

  const derived: string[] = [COLUMNS.pickupHour, COLUMNS.pickupDay, COLUMNS.pickupMonth];
  const columns = [...table.columns, ...derived.filter((c) => !table.columns.includes(c))];
  const rows = table.rows.map((r) => {
    const t = r[src];
    const d = t instanceof Date ? t : null;
    return {
      ...r,
      [COLUMNS.pickupHour]: d ? d.getUTCHours() : null,
      [COLUMNS.pickupDay]: d ? WEEKDAYS[d.getUTCDay()] : null,
      [COLUMNS.pickupMonth]: d ? MONTHS[d.getUTCMonth()] : null,
    };
  });
  return { columns, rows };
}

export function ingest(text: string): Table {
  return deriveTimeFeatures(coerceTimestamps(parseCsv(text)));
}
