// src/lib/types.ts
export type Cell = string | number | boolean | Date | null;
export type Row = Record<string, Cell>;
export type Table = { columns: string[]; rows: Row[] };

export type Capabilities = {
  hasPickupTime: boolean;
  hasDropoffTime: boolean;
  hasTimeFeatures: boolean;
  hasPassengerCount: boolean;
  hasTripDistance: boolean;
  hasVendor: boolean;
  hasFare: boolean;
  hasTip: boolean;
  hasPickupGeo: boolean;
  hasDropoffGeo: boolean;
};

export type FilterSelection = {
  passengerCounts?: Cell[];
  distanceRange?: [number, number];
  vendorIds?: Cell[];
};

// Widget domains, each computed on the table as narrowed by the earlier steps.
export type FilterControls = {
  passengerCounts: Cell[] | null;
  distanceDomain: [number, number] | null;
  vendorIds: Cell[] | null;
};

export const UNAVAILABLE = "unavailable" as const;
export type MetricValue = number | typeof UNAVAILABLE;

export type TripMetrics = {
  tripCount: number;
  totalRevenue: number;
  meanTripDistance: MetricValue;
  meanSpeed: MetricValue;
};

export type NumericSummary = {
  n: number; mean: number; median: number; min: number; max: number;
  stdev: number; q1: number; q3: number; iqr: number; outliersIqr: number;
};

export type ColumnProfile = {
  name: string;
  type: "number" | "string" | "date" | "unknown";
  missingPct: number;
  distinct: number;
  numeric?: NumericSummary | null;
};

export type ChartConfig =
  | { type: "hist"; col: string; bins: number; title: string }
  | { type: "bar"; col: string; order: "index" | "count"; title: string }
  | { type: "map"; lat: string; lon: string; title: string }
  | { type: "box"; col: string; title: string }
  | { type: "pie"; col: string; title: string }
  | { type: "corrHeatmap"; cols: string[]; title: string };
