// src/lib/insights.ts
import type { Capabilities, Table, TripMetrics } from "./types";
import { UNAVAILABLE } from "./types";
import { COLUMNS } from "./schema";
import { buildValueCounts } from "./charts";
import { elapsedHours, formatMetric, round2 } from "./metrics";

export type TripExtras = {
  busiestHour: { hour: number; trips: number } | null;
  busiestDay: { day: string; trips: number } | null;
  topVendor: { vendor: string; sharePct: number } | null;
  tipRatePct: number | null;
  missingPickup: number;
  nonPositiveDurations: number;
};

export type TripInsights = { bullets: string[]; narrative: string; extras: TripExtras };

function tipRate(table: Table): number | null {
  let tips = 0, fares = 0;
  for (const r of table.rows) {
    const t = r[COLUMNS.tip], f = r[COLUMNS.fare];
    if (typeof t !== "number" || typeof f !== "number" || !Number.isFinite(t) || !(f > 0)) continue;
    tips += t; fares += f;
  }
  return fares ? round2((tips / fares) * 100) : null;
}

export function generateTripInsights(table: Table, caps: Capabilities, metrics: TripMetrics): TripInsights {
  const n = table.rows.length;
  const extras: TripExtras = {
    busiestHour: null, busiestDay: null, topVendor: null, tipRatePct: null,
    missingPickup: 0, nonPositiveDurations: 0,
  };

  if (caps.hasTimeFeatures) {
    const [hour] = buildValueCounts(table, COLUMNS.pickupHour, "count");
    if (hour && typeof hour.name === "number") extras.busiestHour = { hour: hour.name, trips: hour.count };
    const [day] = buildValueCounts(table, COLUMNS.pickupDay, "count");
    if (day) extras.busiestDay = { day: String(day.name), trips: day.count };
  }
  if (caps.hasVendor && n) {
    const [top] = buildValueCounts(table, COLUMNS.vendor, "count");
    if (top) extras.topVendor = { vendor: String(top.name), sharePct: +((top.count / n) * 100).toFixed(1) };
  }
  if (caps.hasTip && caps.hasFare) extras.tipRatePct = tipRate(table);
  if (caps.hasPickupTime) {
    extras.missingPickup = table.rows.filter(r => !(r[COLUMNS.pickupTime] instanceof Date)).length;
  }
  if (caps.hasPickupTime && caps.hasDropoffTime) {
    extras.nonPositiveDurations = table.rows.filter(r => {
      const h = elapsedHours(r[COLUMNS.pickupTime], r[COLUMNS.dropoffTime]);
      return h !== null && h <= 0;
    }).length;
  }

  const bullets: string[] = [];
  if (extras.busiestHour) bullets.push(`Busiest pickup hour is ${extras.busiestHour.hour}:00 (${extras.busiestHour.trips} trips).`);
  if (extras.busiestDay) bullets.push(`Busiest pickup day is ${extras.busiestDay.day} (${extras.busiestDay.trips} trips).`);
  if (extras.topVendor) bullets.push(`Vendor ${extras.topVendor.vendor} handles ~${extras.topVendor.sharePct}% of trips.`);
  if (extras.tipRatePct !== null) bullets.push(`Tips average ${extras.tipRatePct}% of fares.`);
  if (extras.missingPickup) bullets.push(`${extras.missingPickup} trip(s) have no usable pickup time.`);
  if (extras.nonPositiveDurations) bullets.push(`${extras.nonPositiveDurations} trip(s) end at or before their pickup time and are left out of the speed average.`);
  if (metrics.meanSpeed === UNAVAILABLE) bullets.push("Average speed is unavailable for this view.");

  const narrative = n
    ? `${n} trip(s), $${metrics.totalRevenue} in fares, ${formatMetric(metrics.meanTripDistance)} mi average distance.`
    : "No trips match the current filters.";

  return { bullets, narrative, extras };
}
