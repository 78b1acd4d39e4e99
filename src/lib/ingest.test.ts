import { describe, it, expect } from "vitest";
import { IngestError, coerceTimestamps, deriveTimeFeatures, ingest, parseCsv, parseTimestamp } from "./ingest";

const CSV = [
  "VendorID,tpep_pickup_datetime,tpep_dropoff_datetime,passenger_count,trip_distance,fare_amount",
  "1,2019-01-07 08:15:00,2019-01-07 08:45:00,1,3.5,12.5",
  "2,not-a-timestamp,2019-01-07 09:00:00,2,1.2,6",
  "1,2019-03-16 23:59:59,2019-03-17 00:10:00,1,2.0,9",
].join("\n");

describe("parseCsv", () => {
  it("types numeric columns and leaves timestamps as text", () => {
    const t = parseCsv(CSV);
    expect(t.columns).toEqual([
      "VendorID", "tpep_pickup_datetime", "tpep_dropoff_datetime", "passenger_count", "trip_distance", "fare_amount",
    ]);
    expect(t.rows[0].VendorID).toBe(1);
    expect(t.rows[0].trip_distance).toBe(3.5);
    expect(t.rows[0].tpep_pickup_datetime).toBe("2019-01-07 08:15:00");
  });

  it("accepts a header with no data rows", () => {
    const t = parseCsv("a,b\n");
    expect(t.columns).toEqual(["a", "b"]);
    expect(t.rows).toEqual([]);
  });

  it("fills short rows with nulls", () => {
    const t = parseCsv("a,b\n1");
    expect(t.rows).toEqual([{ a: 1, b: null }]);
  });

  it("rejects empty input", () => {
    expect(() => parseCsv("")).toThrow(IngestError);
  });

  it("rejects rows wider than the header", () => {
    expect(() => parseCsv("a,b\n1,2,3")).toThrow(IngestError);
  });

  it("rejects unterminated quotes", () => {
    expect(() => parseCsv('a,b\n"1,2\n')).toThrow(IngestError);
  });
});

describe("parseTimestamp", () => {
  it("reads naive values as UTC wall-clock time", () => {
    expect(parseTimestamp("2019-01-07 08:15:00")?.getTime()).toBe(Date.UTC(2019, 0, 7, 8, 15, 0));
    expect(parseTimestamp("2019-01-07T08:15:00.250")?.getTime()).toBe(Date.UTC(2019, 0, 7, 8, 15, 0, 250));
    expect(parseTimestamp("2019-01-07")?.getTime()).toBe(Date.UTC(2019, 0, 7));
  });

  it("honours explicit offsets", () => {
    expect(parseTimestamp("2019-01-07T08:15:00Z")?.getTime()).toBe(Date.UTC(2019, 0, 7, 8, 15));
    expect(parseTimestamp("2019-01-07T08:15:00+02:00")?.getTime()).toBe(Date.UTC(2019, 0, 7, 6, 15));
    expect(parseTimestamp("2019-01-07 08:15:00-0530")?.getTime()).toBe(Date.UTC(2019, 0, 7, 13, 45));
  });

  it("returns null for values that are not timestamps", () => {
    expect(parseTimestamp("not-a-timestamp")).toBeNull();
    expect(parseTimestamp("2019-02-30 10:00:00")).toBeNull();
    expect(parseTimestamp("2019-01-07 25:00:00")).toBeNull();
    expect(parseTimestamp("   ")).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp(42)).toBeNull();
  });

  it("returns null for loose text a date parser would guess at", () => {
    for (const s of ["12", "0", "1.5", "Trip 7", "hello 5", "unknown 3", "Jan 7 2019", "01/07/2019 08:15", "2019-01-07Z"]) {
      expect(parseTimestamp(s)).toBeNull();
    }
  });
});

describe("ingest", () => {
  it("keeps every row and appends derived columns", () => {
    const t = ingest(CSV);
    expect(t.rows).toHaveLength(3);
    expect(t.columns.slice(-3)).toEqual(["pickup_hour", "pickup_day", "pickup_month"]);
  });

  it("derives calendar parts from the pickup time", () => {
    const t = ingest(CSV);
    expect(t.rows[0]).toMatchObject({ pickup_hour: 8, pickup_day: "Monday", pickup_month: "January" });
    expect(t.rows[2]).toMatchObject({ pickup_hour: 23, pickup_day: "Saturday", pickup_month: "March" });
  });

  it("nulls every derived part when the pickup time does not parse", () => {
    const t = ingest(CSV);
    expect(t.rows[1].tpep_pickup_datetime).toBeNull();
    expect(t.rows[1]).toMatchObject({ pickup_hour: null, pickup_day: null, pickup_month: null });
    expect(t.rows[1].tpep_dropoff_datetime).toEqual(new Date(Date.UTC(2019, 0, 7, 9, 0, 0)));
  });

  it("keeps pickup_hour within 0..23", () => {
    for (const r of ingest(CSV).rows) {
      const h = r.pickup_hour;
      if (h !== null) expect(typeof h === "number" && h >= 0 && h <= 23).toBe(true);
    }
  });

  it("derives nothing without a pickup column", () => {
    const t = ingest("trip_distance\n1.5\n2");
    expect(t.columns).toEqual(["trip_distance"]);
  });

  it("derives nothing when no pickup time parses", () => {
    const t = deriveTimeFeatures(coerceTimestamps(parseCsv("tpep_pickup_datetime,x\nbad,1\n,2")));
    expect(t.columns).toEqual(["tpep_pickup_datetime", "x"]);
    expect(t.rows.map(r => r.tpep_pickup_datetime)).toEqual([null, null]);
  });

  it("derives nothing for pickup cells that are not timestamps", () => {
    const t = ingest("tpep_pickup_datetime,passenger_count\n2019-01-07 08:15:00,1\n12,1\nunknown 3,2");
    expect(t.rows.map(r => r.tpep_pickup_datetime)).toEqual([new Date(Date.UTC(2019, 0, 7, 8, 15)), null, null]);
    expect(t.rows.map(r => r.pickup_month)).toEqual(["January", null, null]);
    expect(t.rows.map(r => r.pickup_hour)).toEqual([8, null, null]);
  });

  it("does not mutate its input", () => {
    const raw = parseCsv(CSV);
    coerceTimestamps(raw);
    expect(raw.rows[0].tpep_pickup_datetime).toBe("2019-01-07 08:15:00");
  });
});
