// src/lib/schema.ts
import type { Capabilities, Table } from "./types";

// Standard taxi trip columns this dashboard knows how to use.
export const COLUMNS = {
  pickupTime: "tpep_pickup_datetime",
  dropoffTime: "tpep_dropoff_datetime",
  passengerCount: "passenger_count",
  tripDistance: "trip_distance",
  vendor: "VendorID",
  fare: "fare_amount",
  tip: "tip_amount",
  pickupLat: "pickup_latitude",
  pickupLon: "pickup_longitude",
  dropoffLat: "dropoff_latitude",
  dropoffLon: "dropoff_longitude",
  pickupHour: "pickup_hour",
  pickupDay: "pickup_day",
  pickupMonth: "pickup_month",
} as const;

export const TIMESTAMP_COLUMNS: readonly string[] = [COLUMNS.pickupTime, COLUMNS.dropoffTime];

/**
 * Resolve which optional columns the table carries. Computed once per
 * ingested table; filtering never removes columns, so the result stays valid
 * for every filtered view of it.
 */
export function detectCapabilities(table: Table): Capabilities {
  const has = (c: string) => table.columns.includes(c);
  return {
    hasPickupTime: has(COLUMNS.pickupTime),
    hasDropoffTime: has(COLUMNS.dropoffTime),
    hasTimeFeatures: has(COLUMNS.pickupHour) && has(COLUMNS.pickupDay) && has(COLUMNS.pickupMonth),
    hasPassengerCount: has(COLUMNS.passengerCount),
    hasTripDistance: has(COLUMNS.tripDistance),
    hasVendor: has(COLUMNS.vendor),
    hasFare: has(COLUMNS.fare),
    hasTip: has(COLUMNS.tip),
    hasPickupGeo: has(COLUMNS.pickupLat) && has(COLUMNS.pickupLon),
    hasDropoffGeo: has(COLUMNS.dropoffLat) && has(COLUMNS.dropoffLon),
  };
}
