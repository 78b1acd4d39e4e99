// src/lib/metrics.ts
import type { Capabilities, MetricValue, Table, TripMetrics } from "./types";
import { UNAVAILABLE } from "./types";
import { COLUMNS } from "./schema";

const MS_PER_HOUR = 3_600_000;

export const round2 = (v: number) => Math.round(v * 100) / 100;

function finiteValues(table: Table, col: string): number[] {
  const out: number[] = [];
  for (const r of table.rows) {
    const v = r[col];
    if (typeof v === "number" && Number.isFinite(v)) out.push(v);
  }
  return out;
}

export function totalRevenue(table: Table, caps: Capabilities): number {
  if (!caps.hasFare) return 0;
  return round2(finiteValues(table, COLUMNS.fare).reduce((a, v) => a + v, 0));
}

export function meanTripDistance(table: Table, caps: Capabilities): MetricValue {
  if (!caps.hasTripDistance) return UNAVAILABLE;
  const vals = finiteValues(table, COLUMNS.tripDistance);
  if (vals.length === 0) return UNAVAILABLE;
  return round2(vals.reduce((a, v) => a + v, 0) / vals.length);
}

/** Trip duration in hours, or null when either timestamp is missing. */
export function elapsedHours(pickup: unknown, dropoff: unknown): number | null {
  if (!(pickup instanceof Date) || !(dropoff instanceof Date)) return null;
  return (dropoff.getTime() - pickup.getTime()) / MS_PER_HOUR;
}

/**
 * Mean of per-trip speeds in mph. Trips with a zero or negative duration are
 * left out rather than turning the mean into Infinity/NaN.
 */
export function meanSpeed(table: Table, caps: Capabilities): MetricValue {
  if (!caps.hasPickupTime || !caps.hasDropoffTime || !caps.hasTripDistance) return UNAVAILABLE;
  let sum = 0, n = 0;
  for (const r of table.rows) {
    const hours = elapsedHours(r[COLUMNS.pickupTime], r[COLUMNS.dropoffTime]);
    const dist = r[COLUMNS.tripDistance];
    if (hours === null || !(hours > 0) || !Number.isFinite(hours)) continue;
    if (typeof dist !== "number" || !Number.isFinite(dist)) continue;
    sum += dist / hours;
    n++;
  }
  return n ? round2(sum / n) : UNAVAILABLE;
}

export function computeMetrics(table: Table, caps: Capabilities): TripMetrics {
  return {
    tripCount: table.rows.length,
    totalRevenue: totalRevenue(table, caps),
    meanTripDistance: meanTripDistance(table, caps),
    meanSpeed: meanSpeed(table, caps),
  };
}

export function formatMetric(v: MetricValue): string {
  return v === UNAVAILABLE ? "N/A" : String(v);
}
