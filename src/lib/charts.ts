// src/lib/charts.ts
import type { Capabilities, ChartConfig, Row, Table } from "./types";
import { COLUMNS } from "./schema";
import { HIST_BINS, MAP_POINT_CAP, PREVIEW_ROWS } from "./limits";
import { corrMatrix, histogram, isNumericColumn } from "./stats";

/** Charts for the columns this table has, in page order. */
export function planCharts(table: Table, caps: Capabilities): ChartConfig[] {
  const cfgs: ChartConfig[] = [];

  if (caps.hasTripDistance) cfgs.push({ type: "hist", col: COLUMNS.tripDistance, bins: HIST_BINS, title: "Trip Distance Distribution" });
  if (caps.hasFare) cfgs.push({ type: "hist", col: COLUMNS.fare, bins: HIST_BINS, title: "Fare Amount Distribution" });

  if (caps.hasTimeFeatures) {
    cfgs.push({ type: "bar", col: COLUMNS.pickupHour, order: "index", title: "Trips per Hour" });
    cfgs.push({ type: "bar", col: COLUMNS.pickupDay, order: "count", title: "Trips per Day" });
    cfgs.push({ type: "bar", col: COLUMNS.pickupMonth, order: "count", title: "Trips per Month" });
  }

  if (caps.hasPickupGeo) cfgs.push({ type: "map", lat: COLUMNS.pickupLat, lon: COLUMNS.pickupLon, title: "Pickup Locations" });
  if (caps.hasDropoffGeo) cfgs.push({ type: "map", lat: COLUMNS.dropoffLat, lon: COLUMNS.dropoffLon, title: "Dropoff Locations" });

  if (caps.hasTip) cfgs.push({ type: "box", col: COLUMNS.tip, title: "Tip Amount Distribution" });
  if (caps.hasVendor) cfgs.push({ type: "pie", col: COLUMNS.vendor, title: "Trips by Vendor" });

  const numCols = table.columns.filter((c) => isNumericColumn(table, c));
  if (numCols.length >= 2) cfgs.push({ type: "corrHeatmap", cols: numCols, title: "Correlation Between Features" });

  return cfgs;
}

// -------- builders --------
export function previewRows(table: Table, n = PREVIEW_ROWS): Row[] {
  return table.rows.slice(0, n);
}

export function buildHistData(table: Table, col: string, bins = HIST_BINS) {
  const vals: number[] = [];
  for (const r of table.rows) {
    const v = r[col];
    if (typeof v === "number") vals.push(v);
  }
  const { bins: centers, counts } = histogram(vals, bins);
  return centers.map((c, i) => ({ bin: c, count: counts[i] }));
}

/**
 * Row counts per distinct non-null value. "index" sorts by the value itself
 * (hours 0..23), "count" by frequency, highest first.
 */
export function buildValueCounts(table: Table, col: string, order: "index" | "count") {
  const counts = new Map<string | number, number>();
  for (const r of table.rows) {
    const v = r[col] ?? null;
    if (v === null) continue;
    const key = typeof v === "number" ? v : String(v);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  const data = [...counts.entries()].map(([name, count]) => ({ name, count }));
  if (order === "count") return data.sort((a, b) => b.count - a.count);
  return data.sort((a, b) =>
    typeof a.name === "number" && typeof b.name === "number"
      ? a.name - b.name
      : String(a.name).localeCompare(String(b.name)),
  );
}

/** First `cap` rows with both coordinates present, in table order. */
export function buildMapPoints(table: Table, lat: string, lon: string, cap = MAP_POINT_CAP) {
  const points: { lat: number; lon: number }[] = [];
  for (const r of table.rows) {
    if (points.length >= cap) break;
    const y = r[lat], x = r[lon];
    if (typeof y === "number" && typeof x === "number" && Number.isFinite(y) && Number.isFinite(x)) {
      points.push({ lat: y, lon: x });
    }
  }
  return points;
}

export function buildBoxSummary(table: Table, col: string) {
  const vals: number[] = [];
  for (const r of table.rows) {
    const v = r[col];
    if (typeof v === "number" && Number.isFinite(v)) vals.push(v);
  }
  if (!vals.length) return null;
  vals.sort((a, b) => a - b);
  const q1 = vals[Math.floor((vals.length - 1) * 0.25)];
  const q2 = vals[Math.floor((vals.length - 1) * 0.5)];
  const q3 = vals[Math.floor((vals.length - 1) * 0.75)];
  const iqr = q3 - q1, lo = q1 - 1.5 * iqr, hi = q3 + 1.5 * iqr;
  const min = vals[0], max = vals[vals.length - 1];
  const whiskerLo = vals.find((v) => v >= lo) ?? min;
  const whiskerHi = [...vals].reverse().find((v) => v <= hi) ?? max;
  return { q1, q2, q3, whiskerLo, whiskerHi, min, max };
}

export function buildPieData(table: Table, col: string) {
  return buildValueCounts(table, col, "count").map((d) => ({ name: String(d.name), value: d.count }));
}

export function buildCorrHeatmap(table: Table, cols: string[]) {
  const { mat } = corrMatrix(table, cols);
  const data: { x: string; y: string; r: number | null }[] = [];
  for (let i = 0; i < cols.length; i++) {
    for (let j = 0; j < cols.length; j++) {
      const r = mat[i][j];
      data.push({ x: cols[i], y: cols[j], r: Number.isFinite(r) ? r : null });
    }
  }
  return { cols, data };
}
