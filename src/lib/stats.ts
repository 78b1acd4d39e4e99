// src/lib/stats.ts
import type { Cell, ColumnProfile, NumericSummary, Table } from "./types";

/** ---- type inference ---- */
export function inferType(values: Cell[]): ColumnProfile["type"] {
  let n = 0, s = 0, d = 0;
  for (const v of values) {
    if (v === null) continue;
    if (typeof v === "number" && Number.isFinite(v)) n++;
    else if (v instanceof Date && !Number.isNaN(v.getTime())) d++;
    else s++;
  }
  const max = Math.max(n, s, d);
  if (max === 0) return "unknown";
  if (max === n) return "number";
  if (max === d) return "date";
  return "string";
}

// Every non-null value is a number (the heatmap only takes such columns).
export function isNumericColumn(table: Table, col: string): boolean {
  let seen = false;
  for (const r of table.rows) {
    const v = r[col] ?? null;
    if (v === null) continue;
    if (typeof v !== "number") return false;
    seen = true;
  }
  return seen;
}

/** ======================= Basic Stats ======================= */

function quantile(sortedNums: number[], q: number) {
  if (sortedNums.length === 0) return NaN;
  const pos = (sortedNums.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  const next = sortedNums[base + 1];
  if (next !== undefined) return sortedNums[base] + rest * (next - sortedNums[base]);
  return sortedNums[base];
}

function stdev(nums: number[], mean: number) {
  if (nums.length <= 1) return 0;
  const v = nums.reduce((a, x) => a + (x - mean) ** 2, 0) / (nums.length - 1);
  return Math.sqrt(v);
}

export function summarize(nums: number[]): NumericSummary | null {
  const n = nums.length;
  if (!n) return null;
  const sorted = [...nums].sort((a, b) => a - b);
  const mean = nums.reduce((a, x) => a + x, 0) / n;
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const outliersIqr = nums.filter(x => x < q1 - 1.5 * iqr || x > q3 + 1.5 * iqr).length;
  return {
    n, mean, median: quantile(sorted, 0.5), min: sorted[0], max: sorted[n - 1],
    stdev: stdev(nums, mean), q1, q3, iqr, outliersIqr,
  };
}

export function profileTable(table: Table): ColumnProfile[] {
  return table.columns.map((c) => {
    const colVals = table.rows.map(r => r[c] ?? null);
    const missing = colVals.filter(v => v === null).length;
    const missingPct = Math.round((missing / Math.max(1, table.rows.length)) * 100);
    const type = inferType(colVals);
    const distinct = new Set(colVals.map(v => (v instanceof Date ? v.getTime() : v)).filter(v => v !== null)).size;
    const nums = colVals.filter((v): v is number => typeof v === "number" && Number.isFinite(v));
    const numeric = type === "number" ? summarize(nums) : null;
    return { name: c, type, missingPct, distinct, numeric };
  });
}

/** ======================= Associations ======================= */

export function pearson(xs: number[], ys: number[]) {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return NaN;
  const mx = xs.slice(0, n).reduce((a, v) => a + v, 0) / n;
  const my = ys.slice(0, n).reduce((a, v) => a + v, 0) / n;
  let num = 0, dx2 = 0, dy2 = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx, dy = ys[i] - my;
    num += dx * dy; dx2 += dx * dx; dy2 += dy * dy;
  }
  const den = Math.sqrt(dx2 * dy2);
  return den ? num / den : NaN;
}

/** Pearson matrix over the given columns, each pair using rows where both are finite. */
export function corrMatrix(table: Table, cols: string[]) {
  const mat: number[][] = cols.map(() => cols.map(() => NaN));
  for (let i = 0; i < cols.length; i++) {
    for (let j = i; j < cols.length; j++) {
      const xs: number[] = [], ys: number[] = [];
      for (const r of table.rows) {
        const x = r[cols[i]], y = r[cols[j]];
        if (typeof x === "number" && typeof y === "number" && Number.isFinite(x) && Number.isFinite(y)) {
          xs.push(x); ys.push(y);
        }
      }
      const rho = pearson(xs, ys);
      mat[i][j] = mat[j][i] = i === j && Number.isFinite(rho) ? 1 : rho;
    }
  }
  return { cols, mat };
}

/** ======================= Histogram helper ======================= */

export function histogram(values: number[], bins = 10): { bins: number[]; counts: number[]; edges: number[] } {
  const nums = values.filter(Number.isFinite);
  if (nums.length === 0) return { bins: [], counts: [], edges: [] };
  let min = Infinity, max = -Infinity;
  for (const v of nums) { if (v < min) min = v; if (v > max) max = v; }
  const width = (max - min) || 1;
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + (i * width) / bins);
  const counts: number[] = Array(bins).fill(0);
  for (const v of nums) {
    const idx = Math.min(bins - 1, Math.max(0, Math.floor(((v - min) / width) * bins)));
    counts[idx]++;
  }
  const centers = counts.map((_, i) => (edges[i] + edges[i + 1]) / 2);
  return { bins: centers, counts, edges };
}
