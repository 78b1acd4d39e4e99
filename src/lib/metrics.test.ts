import { describe, it, expect } from "vitest";
import type { Row, Table } from "./types";
import { UNAVAILABLE } from "./types";
import { detectCapabilities } from "./schema";
import { ingest } from "./ingest";
import { computeMetrics, formatMetric, meanSpeed, meanTripDistance, totalRevenue } from "./metrics";

const table = (rows: Row[]): Table => ({ columns: Object.keys(rows[0] ?? {}), rows });
const at = (h: number, m = 0) => new Date(Date.UTC(2019, 0, 7, h, m));

function trip(distance: number, from: Date, to: Date): Row {
  return { tpep_pickup_datetime: from, tpep_dropoff_datetime: to, trip_distance: distance };
}

describe("meanSpeed", () => {
  it("skips trips with zero elapsed time", () => {
    const t = table([trip(10, at(8), at(9)), trip(5, at(8), at(8))]);
    expect(meanSpeed(t, detectCapabilities(t))).toBe(10);
  });

  it("skips trips that end before they start", () => {
    const t = table([trip(6, at(8), at(8, 30)), trip(5, at(9), at(8))]);
    expect(meanSpeed(t, detectCapabilities(t))).toBe(12);
  });

  it("skips trips with a missing timestamp", () => {
    const t = table([trip(4, at(8), at(10)), { tpep_pickup_datetime: null, tpep_dropoff_datetime: at(9), trip_distance: 50 }]);
    expect(meanSpeed(t, detectCapabilities(t))).toBe(2);
  });

  it("is unavailable when every trip is degenerate", () => {
    const t = table([trip(5, at(8), at(8)), trip(3, at(9), at(7))]);
    expect(meanSpeed(t, detectCapabilities(t))).toBe(UNAVAILABLE);
  });

  it("is unavailable without timestamp columns", () => {
    const t = table([{ trip_distance: 3 }]);
    expect(meanSpeed(t, detectCapabilities(t))).toBe(UNAVAILABLE);
  });
});

describe("totalRevenue", () => {
  it("sums fares and rounds to cents", () => {
    const t = table([{ fare_amount: 12.5 }, { fare_amount: 6.25 }, { fare_amount: null }, { fare_amount: 9.1 }]);
    expect(totalRevenue(t, detectCapabilities(t))).toBe(27.85);
  });

  it("is zero without a fare column", () => {
    const t = table([{ trip_distance: 1 }]);
    expect(totalRevenue(t, detectCapabilities(t))).toBe(0);
  });
});

describe("meanTripDistance", () => {
  it("rounds to two decimals", () => {
    const t = table([{ trip_distance: 1 }, { trip_distance: 2 }, { trip_distance: 4 }]);
    expect(meanTripDistance(t, detectCapabilities(t))).toBe(2.33);
  });

  it("is unavailable when the column is absent", () => {
    const t = table([{ fare_amount: 1 }]);
    expect(meanTripDistance(t, detectCapabilities(t))).toBe(UNAVAILABLE);
  });
});

describe("computeMetrics", () => {
  it("reports all four metrics for an uploaded file", () => {
    const t = ingest([
      "tpep_pickup_datetime,tpep_dropoff_datetime,trip_distance,fare_amount",
      "2019-01-07 08:15:00,2019-01-07 08:45:00,3.5,12.5",
      "garbage,2019-01-07 09:00:00,1.2,6",
      "2019-03-16 23:59:59,2019-03-17 00:10:00,2.0,9",
    ].join("\n"));
    expect(computeMetrics(t, detectCapabilities(t))).toEqual({
      tripCount: 3,
      totalRevenue: 27.5,
      meanTripDistance: 2.23,
      meanSpeed: 9.49,
    });
  });
});

describe("formatMetric", () => {
  it("shows the sentinel as N/A", () => {
    expect(formatMetric(UNAVAILABLE)).toBe("N/A");
    expect(formatMetric(9.49)).toBe("9.49");
  });
});
