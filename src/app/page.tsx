// src/app/page.tsx
"use client";

import { useMemo, useRef, useState } from "react";
import type { ReactNode } from "react";
import html2canvas from "html2canvas";
import {
  ResponsiveContainer,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
  Legend,
  BarChart,
  Bar,
  ScatterChart,
  Scatter,
  PieChart,
  Pie,
  Cell as PieCell,
} from "recharts";

import type { Capabilities, Cell, ChartConfig, FilterSelection, Table } from "@/lib/types";
import { IngestError, ingest } from "@/lib/ingest";
import { detectCapabilities } from "@/lib/schema";
import { applyFilters, clampRange } from "@/lib/filters";
import { computeMetrics, formatMetric } from "@/lib/metrics";
import { profileTable } from "@/lib/stats";
import {
  planCharts,
  previewRows,
  buildHistData,
  buildValueCounts,
  buildMapPoints,
  buildBoxSummary,
  buildPieData,
  buildCorrHeatmap,
} from "@/lib/charts";
import { generateTripInsights } from "@/lib/insights";
import { MAX_UPLOAD_BYTES, PREVIEW_ROWS } from "@/lib/limits";

/* ------------------------- utils ------------------------- */
const numFmt = (v: number) => {
  if (!Number.isFinite(v)) return "";
  const abs = Math.abs(v);
  if (abs >= 1_000_000) return (v / 1_000_000).toFixed(1).replace(/\.0$/, "") + "M";
  if (abs >= 1_000) return (v / 1_000).toFixed(1).replace(/\.0$/, "") + "k";
  return String(Math.round(v * 100) / 100);
};
const cellFmt = (v: Cell) => {
  if (v === null) return "";
  if (v instanceof Date) return v.toISOString().replace("T", " ").replace(/\.000Z$/, "").replace("Z", "");
  return String(v);
};

const axisTick = { fill: "#e5e7eb", fontSize: 12 };
const axisStroke = "rgba(255,255,255,0.25)";
const gridStroke = "rgba(255,255,255,0.12)";
const tooltipStyle = { background: "#0f172a", border: "1px solid rgba(255,255,255,0.15)", color: "#fff" };

// palette for pie segments
const palette = ["#60a5fa", "#a78bfa", "#34d399", "#f472b6", "#f59e0b", "#22d3ee", "#f87171", "#93c5fd"];

function toggle(list: Cell[], v: Cell) {
  return list.includes(v) ? list.filter((x) => x !== v) : [...list, v];
}

function ChartCard({ title, children }: { title: string; children: ReactNode }) {
  const ref = useRef<HTMLDivElement>(null);
  async function exportPNG() {
    if (!ref.current) return;
    try {
      const canvas = await html2canvas(ref.current);
      const link = document.createElement("a");
      link.download = `${title.replace(/\s+/g, "_")}.png`;
      link.href = canvas.toDataURL();
      link.click();
    } catch (e) {
      console.error("[export] PNG export failed", e);
    }
  }
  return (
    <div className="rounded-xl border border-white/15 bg-white/5 p-3 space-y-2">
      <div className="flex items-center justify-between">
        <p className="text-sm font-medium text-white/90">{title}</p>
        <button className="btn text-xs" onClick={() => void exportPNG()}>Export PNG</button>
      </div>
      <div ref={ref} style={{ width: "100%", height: 340 }}>{children}</div>
    </div>
  );
}

function MetricCard({ label, value }: { label: string; value: string }) {
  return (
    <div className="rounded-xl border border-white/15 bg-white/5 px-4 py-3">
      <p className="text-xs small-muted">{label}</p>
      <p className="text-2xl font-semibold text-white/95">{value}</p>
    </div>
  );
}

function ChartView({ table, cfg }: { table: Table; cfg: ChartConfig }) {
  if (cfg.type === "hist") {
    const data = buildHistData(table, cfg.col, cfg.bins);
    return (
      <ChartCard title={cfg.title}>
        <ResponsiveContainer>
          <BarChart data={data} margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
            <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
            <XAxis dataKey="bin" tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
            <YAxis tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
            <Tooltip contentStyle={tooltipStyle} formatter={(v) => [numFmt(Number(v)), "count"]} />
            <Bar dataKey="count" fill="#34d399" />
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>
    );
  }
  if (cfg.type === "bar") {
    const data = buildValueCounts(table, cfg.col, cfg.order);
    return (
      <ChartCard title={cfg.title}>
        <ResponsiveContainer>
          <BarChart data={data} margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
            <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
            <XAxis dataKey="name" tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} />
            <YAxis tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} tickFormatter={numFmt} />
            <Tooltip contentStyle={tooltipStyle} formatter={(v) => [numFmt(Number(v)), "trips"]} />
            <Bar dataKey="count" fill="#60a5fa" />
          </BarChart>
        </ResponsiveContainer>
      </ChartCard>
    );
  }
  if (cfg.type === "map") {
    const data = buildMapPoints(table, cfg.lat, cfg.lon);
    return (
      <ChartCard title={`${cfg.title} (${data.length} points)`}>
        <ResponsiveContainer>
          <ScatterChart margin={{ top: 10, right: 20, bottom: 20, left: 10 }}>
            <CartesianGrid stroke={gridStroke} strokeDasharray="3 3" />
            <XAxis type="number" dataKey="lon" name="longitude" domain={["auto", "auto"]} tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} />
            <YAxis type="number" dataKey="lat" name="latitude" domain={["auto", "auto"]} tick={axisTick} axisLine={{ stroke: axisStroke }} tickLine={{ stroke: axisStroke }} />
            <Tooltip contentStyle={tooltipStyle} />
            <Scatter data={data} fill="#a78bfa" shape="circle" isAnimationActive={false} />
          </ScatterChart>
        </ResponsiveContainer>
      </ChartCard>
    );
  }
  if (cfg.type === "box") {
    const s = buildBoxSummary(table, cfg.col);
    return (
      <div className="rounded-xl border border-white/15 bg-white/5 p-3">
        <p className="mb-2 text-sm font-medium text-white/90">{cfg.title}</p>
        {!s ? (
          <p className="text-sm">Not enough data</p>
        ) : (
          <div className="text-sm text-white/90">
            <div>Q1: {s.q1.toFixed(2)} | Median: {s.q2.toFixed(2)} | Q3: {s.q3.toFixed(2)}</div>
            <div>Whiskers: {s.whiskerLo.toFixed(2)} to {s.whiskerHi.toFixed(2)}</div>
            <div>Min/Max: {s.min} / {s.max}</div>
          </div>
        )}
      </div>
    );
  }
  if (cfg.type === "pie") {
    const pieData = buildPieData(table, cfg.col);
    return (
      <ChartCard title={cfg.title}>
        <ResponsiveContainer>
          <PieChart>
            <Pie data={pieData} dataKey="value" nameKey="name" innerRadius={60} outerRadius={100} stroke="none">
              {pieData.map((d, i) => <PieCell key={d.name} fill={palette[i % palette.length]} />)}
            </Pie>
            <Tooltip contentStyle={tooltipStyle} formatter={(v, n) => [numFmt(Number(v)), String(n)]} />
            <Legend />
          </PieChart>
        </ResponsiveContainer>
      </ChartCard>
    );
  }
  const hm = buildCorrHeatmap(table, cfg.cols);
  return (
    <div className="rounded-xl border border-white/15 bg-white/5 p-3 overflow-auto lg:col-span-2">
      <p className="mb-2 text-sm font-medium text-white/90">{cfg.title}</p>
      <div className="overflow-auto">
        <table className="text-xs border-collapse">
          <thead>
            <tr>
              <th className="p-1 text-white/90"></th>
              {hm.cols.map(c => <th key={c} className="p-1 text-left text-white/90">{c}</th>)}
            </tr>
          </thead>
          <tbody>
            {hm.cols.map((rowC, i) => (
              <tr key={rowC}>
                <th className="p-1 text-left text-white/90">{rowC}</th>
                {hm.cols.map((colC, j) => {
                  const r = hm.data[i * hm.cols.length + j].r;
                  if (r === null) return <td key={colC} className="p-2 border text-white/50">·</td>;
                  const intensity = Math.round(Math.abs(r) * 255);
                  const bg = `rgb(${r >= 0 ? 32 + intensity/4 : 32}, ${32 + (255 - intensity)/4}, ${r >= 0 ? 32 : 32 + intensity/4})`;
                  return (
                    <td key={colC} className="p-2 border text-white/90" title={`r=${r.toFixed(2)}`} style={{ background: bg }}>
                      {r.toFixed(2)}
                    </td>
                  );
                })}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}

/* ------------------------- component ------------------------- */
type TabKey = "Load" | "Overview" | "Profile" | "Charts" | "Insights";
const TABS: TabKey[] = ["Load", "Overview", "Profile", "Charts", "Insights"];

type Loaded = { table: Table; caps: Capabilities };

export default function Home() {
  const [active, setActive] = useState<TabKey>("Load");
  // ingestion result is kept per upload; filter changes only rerun the pipeline below
  const [loaded, setLoaded] = useState<Loaded | null>(null);
  const [selection, setSelection] = useState<FilterSelection>({});
  const [toast, setToast] = useState<string>("");
  const [dzHover, setDzHover] = useState(false);
  const [csvFileName, setCsvFileName] = useState("");
  const fileInput = useRef<HTMLInputElement>(null);

  function showToast(msg: string) { setToast(msg); setTimeout(() => setToast(""), 2600); }

  const view = useMemo(() => {
    if (!loaded) return null;
    const { table, controls } = applyFilters(loaded.table, loaded.caps, selection);
    const metrics = computeMetrics(table, loaded.caps);
    return {
      table,
      controls,
      metrics,
      charts: planCharts(table, loaded.caps),
      insights: generateTripInsights(table, loaded.caps, metrics),
    };
  }, [loaded, selection]);

  const profile = useMemo(() => (view ? profileTable(view.table) : null), [view]);

  async function loadCSVFile(file: File) {
    if (file.size > MAX_UPLOAD_BYTES) { showToast("File too large"); return; }
    setCsvFileName(file.name);
    try {
      const text = await file.text();
      const table = ingest(text);
      setLoaded({ table, caps: detectCapabilities(table) });
      setSelection({});
      setActive("Overview");
      showToast(`Loaded CSV: ${table.rows.length} rows`);
    } catch (e) {
      console.error("[upload] ingestion failed", e);
      setLoaded(null);
      showToast(e instanceof IngestError ? e.message : "Failed to read CSV");
    }
  }

  function clearAll() {
    setLoaded(null); setSelection({}); setCsvFileName(""); setActive("Load");
  }

  const controls = view?.controls;
  const selectedPassengers = selection.passengerCounts ?? controls?.passengerCounts ?? [];
  const selectedVendors = selection.vendorIds ?? controls?.vendorIds ?? [];
  const domain = controls?.distanceDomain ?? null;
  // a passenger change can narrow the domain under a stored range
  const distance = domain ? clampRange(selection.distanceRange ?? domain, domain) : null;

  return (
    <div className="space-y-6">
      {/* Tabs */}
      <nav className="tabs sticky top-4 z-10">
        {TABS.map((t) => (
          <button key={t} className="tab" data-active={active === t} onClick={() => setActive(t)}>{t}</button>
        ))}
        <div className="ml-auto flex gap-2">
          <button className="btn text-white" onClick={clearAll}>Reset</button>
        </div>
      </nav>

      {/* LOAD */}
      {active === "Load" && (
        <section id="load" className="card p-5">
          <h2 className="section-title mb-3">1) Upload taxi trips</h2>
          <div
            className="dropzone"
            data-hover={dzHover}
            onDragOver={(e) => { e.preventDefault(); setDzHover(true); }}
            onDragLeave={() => setDzHover(false)}
            onDrop={(e) => {
              e.preventDefault(); setDzHover(false);
              const f = e.dataTransfer.files?.[0];
              if (f && (f.type.includes("csv") || f.name.endsWith(".csv"))) void loadCSVFile(f);
            }}
          >
            <div className="space-y-2">
              <p className="text-sm opacity-90">Drag & drop a trip CSV here</p>
              <p className="text-xs small-muted">or</p>
              <button className="btn" onClick={() => fileInput.current?.click()}>Browse</button>
              {csvFileName && <div className="file-pill" title={csvFileName}>{csvFileName}</div>}
            </div>
            <input
              ref={fileInput}
              type="file"
              accept=".csv"
              hidden
              onChange={(e) => { const f = e.target.files?.[0]; if (f) void loadCSVFile(f); }}
            />
          </div>
          <p className="mt-3 text-xs small-muted">
            Recognised columns: tpep_pickup_datetime, tpep_dropoff_datetime, passenger_count, trip_distance,
            VendorID, fare_amount, tip_amount, pickup/dropoff latitude and longitude. Any of them may be missing.
          </p>
        </section>
      )}

      {/* OVERVIEW */}
      {active === "Overview" && loaded && view && (
        <>
          <section id="filters" className="card p-5 space-y-4">
            <div className="flex items-center justify-between">
              <h2 className="section-title">2) Filters</h2>
              <button className="btn text-xs" onClick={() => setSelection({})}>Reset filters</button>
            </div>

            {controls?.passengerCounts && (
              <div>
                <p className="text-sm font-medium mb-1">Passenger count</p>
                <div className="flex flex-wrap gap-2">
                  {controls.passengerCounts.map((v) => (
                    <label key={String(v)} className="file-pill cursor-pointer">
                      <input
                        type="checkbox"
                        className="mr-1"
                        checked={selectedPassengers.includes(v)}
                        onChange={() => setSelection((s) => ({ ...s, passengerCounts: toggle(selectedPassengers, v) }))}
                      />
                      {cellFmt(v)}
                    </label>
                  ))}
                </div>
              </div>
            )}

            {domain && distance && (
              <div>
                <p className="text-sm font-medium mb-1">
                  Trip distance: {distance[0]} to {distance[1]} mi
                </p>
                <div className="flex gap-3">
                  <input
                    type="range"
                    className="w-full"
                    min={domain[0]}
                    max={domain[1]}
                    step="any"
                    value={distance[0]}
                    onChange={(e) => setSelection((s) => ({ ...s, distanceRange: [Math.min(Number(e.target.value), distance[1]), distance[1]] }))}
                  />
                  <input
                    type="range"
                    className="w-full"
                    min={domain[0]}
                    max={domain[1]}
                    step="any"
                    value={distance[1]}
                    onChange={(e) => setSelection((s) => ({ ...s, distanceRange: [distance[0], Math.max(Number(e.target.value), distance[0])] }))}
                  />
                </div>
              </div>
            )}

            {controls?.vendorIds && (
              <div>
                <p className="text-sm font-medium mb-1">Vendor ID</p>
                <div className="flex flex-wrap gap-2">
                  {controls.vendorIds.map((v) => (
                    <label key={String(v)} className="file-pill cursor-pointer">
                      <input
                        type="checkbox"
                        className="mr-1"
                        checked={selectedVendors.includes(v)}
                        onChange={() => setSelection((s) => ({ ...s, vendorIds: toggle(selectedVendors, v) }))}
                      />
                      {cellFmt(v)}
                    </label>
                  ))}
                </div>
              </div>
            )}
          </section>

          <section id="metrics" className="card p-5">
            <h2 className="section-title mb-3">Key metrics</h2>
            <div className="grid gap-3 sm:grid-cols-2 lg:grid-cols-4">
              <MetricCard label="Total Trips" value={String(view.metrics.tripCount)} />
              <MetricCard label="Total Revenue ($)" value={String(view.metrics.totalRevenue)} />
              <MetricCard label="Average Trip Distance (mi)" value={formatMetric(view.metrics.meanTripDistance)} />
              <MetricCard label="Average Speed (mph)" value={formatMetric(view.metrics.meanSpeed)} />
            </div>
          </section>

          <section id="preview" className="card p-5">
            <h2 className="section-title mb-2">Preview</h2>
            <p className="mb-3 small-muted text-white/80">
              <b className="text-white/90">{view.table.rows.length}</b> of {loaded.table.rows.length} rows • <b className="text-white/90">{view.table.columns.length}</b> columns
            </p>
            <div className="table-wrap">
              <table className="min-w-full text-sm">
                <thead className="sticky top-0 z-10">
                  <tr className="bg-white/5 backdrop-blur">
                    {view.table.columns.map((c) => (
                      <th key={c} className="border px-3 py-2 text-left font-medium text-white/95">{c}</th>
                    ))}
                  </tr>
                </thead>
                <tbody>
                  {previewRows(view.table).map((row, i) => (
                    <tr key={i} className="odd:bg-white/0 even:bg-white/5">
                      {view.table.columns.map((c) => (
                        <td key={c} className="border px-3 py-2 text-white/90">{cellFmt(row[c] ?? null)}</td>
                      ))}
                    </tr>
                  ))}
                </tbody>
              </table>
            </div>
            <p className="mt-2 text-xs small-muted">Showing first {PREVIEW_ROWS} rows.</p>
          </section>
        </>
      )}

      {/* PROFILE */}
      {active === "Profile" && profile && (
        <section id="profile" className="card p-5">
          <h2 className="section-title mb-2">3) Profile</h2>
          <div className="table-wrap">
            <table className="min-w-full text-sm">
              <thead>
                <tr className="bg-white/5 backdrop-blur">
                  <th className="border px-3 py-2 text-left font-medium text-white/95">Column</th>
                  <th className="border px-3 py-2 text-left font-medium text-white/95">Type</th>
                  <th className="border px-3 py-2 text-left font-medium text-white/95">Missing %</th>
                  <th className="border px-3 py-2 text-left font-medium text-white/95">Distinct</th>
                  <th className="border px-3 py-2 text-left font-medium text-white/95">Numeric Summary</th>
                </tr>
              </thead>
              <tbody>
                {profile.map((p) => (
                  <tr key={p.name} className="odd:bg-white/0 even:bg-white/5">
                    <td className="border px-3 py-2 text-white/90">{p.name}</td>
                    <td className="border px-3 py-2 text-white/90">{p.type}</td>
                    <td className="border px-3 py-2 text-white/90">{p.missingPct}%</td>
                    <td className="border px-3 py-2 text-white/90">{p.distinct}</td>
                    <td className="border px-3 py-2 text-white/90">
                      {p.numeric
                        ? `n=${p.numeric.n}, mean=${p.numeric.mean.toFixed(2)}, med=${p.numeric.median.toFixed(2)}, min=${p.numeric.min}, max=${p.numeric.max}, sd=${p.numeric.stdev.toFixed(2)}, Q1=${p.numeric.q1.toFixed(2)}, Q3=${p.numeric.q3.toFixed(2)}, IQR=${p.numeric.iqr.toFixed(2)}, outliers(IQR)=${p.numeric.outliersIqr}`
                        : "-"}
                    </td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        </section>
      )}

      {/* CHARTS */}
      {active === "Charts" && view && (
        <section id="charts" className="card p-5 space-y-3">
          <h2 className="section-title">4) Charts</h2>
          {view.charts.length === 0 ? (
            <p className="text-sm">No recognised columns to chart.</p>
          ) : (
            <div className="grid gap-6 lg:grid-cols-2">
              {view.charts.map((cfg) => <ChartView key={cfg.title} table={view.table} cfg={cfg} />)}
            </div>
          )}
        </section>
      )}

      {/* INSIGHTS */}
      {active === "Insights" && view && (
        <section id="insights" className="card p-5 space-y-3">
          <h2 className="section-title mb-2">5) Insights</h2>
          <p className="text-sm text-white/95">{view.insights.narrative}</p>
          <ul className="grid gap-2 sm:grid-cols-2">
            {view.insights.bullets.length > 0
              ? view.insights.bullets.map((b, i) => (
                  <li key={i} className="rounded-lg border border-white/15 bg-white/5 px-3 py-2 text-sm text-white/90">{b}</li>
                ))
              : <li className="text-sm">Nothing noteworthy in this view.</li>}
          </ul>
        </section>
      )}

      {toast && <div className="toast">{toast}</div>}
    </div>
  );
}
