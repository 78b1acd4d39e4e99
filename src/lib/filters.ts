// src/lib/filters.ts
import type { Capabilities, Cell, FilterControls, FilterSelection, Table } from "./types";
import { COLUMNS } from "./schema";

// numbers first (numerically), then everything else by string form
export function compareCells(a: Cell, b: Cell): number {
  const an = typeof a === "number", bn = typeof b === "number";
  if (an && bn) return a - b;
  if (an) return -1;
  if (bn) return 1;
  const sa = String(a), sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

export function distinctSorted(table: Table, col: string): Cell[] {
  const seen = new Set<Cell>();
  for (const r of table.rows) {
    const v = r[col] ?? null;
    if (v !== null) seen.add(v);
  }
  return [...seen].sort(compareCells);
}

export function observedRange(table: Table, col: string): [number, number] | null {
  let min = Infinity, max = -Infinity;
  for (const r of table.rows) {
    const v = r[col];
    if (typeof v !== "number" || !Number.isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return min <= max ? [min, max] : null;
}

export function filterByMembership(table: Table, col: string, selected: Iterable<Cell>): Table {
  const keep = new Set<Cell>(selected);
  const rows = table.rows.filter((r) => {
    const v = r[col] ?? null;
    return v !== null && keep.has(v);
  });
  return { columns: table.columns, rows };
}

export function filterByRange(table: Table, col: string, [low, high]: [number, number]): Table {
  const rows = table.rows.filter((r) => {
    const v = r[col];
    return typeof v === "number" && Number.isFinite(v) && v >= low && v <= high;
  });
  return { columns: table.columns, rows };
}

/** Pulls both ends of a range inside the domain, e.g. after the domain narrowed. */
export function clampRange([low, high]: [number, number], [min, max]: [number, number]): [number, number] {
  const lo = Math.min(Math.max(low, min), max);
  const hi = Math.max(Math.min(high, max), min);
  return lo <= hi ? [lo, hi] : [hi, lo];
}

/**
 * Passenger count, then trip distance, then vendor. Each step's default domain
 * comes from the table left by the previous steps, so widgets only offer values
 * that can still match.
 */
export function applyFilters(
  table: Table,
  caps: Capabilities,
  selection: FilterSelection = {},
): { table: Table; controls: FilterControls } {
  const controls: FilterControls = { passengerCounts: null, distanceDomain: null, vendorIds: null };
  let current = table;

  if (caps.hasPassengerCount) {
    const options = distinctSorted(current, COLUMNS.passengerCount);
    controls.passengerCounts = options;
    current = filterByMembership(current, COLUMNS.passengerCount, selection.passengerCounts ?? options);
  }

  if (caps.hasTripDistance) {
    const domain = observedRange(current, COLUMNS.tripDistance);
    controls.distanceDomain = domain;
    // no numeric distances left: nothing to slide over, leave the table alone
    if (domain) current = filterByRange(current, COLUMNS.tripDistance, selection.distanceRange ?? domain);
  }

  if (caps.hasVendor) {
    const options = distinctSorted(current, COLUMNS.vendor);
    controls.vendorIds = options;
    current = filterByMembership(current, COLUMNS.vendor, selection.vendorIds ?? options);
  }

  return { table: current, controls };
}
