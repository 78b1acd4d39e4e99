// Rendering and ingestion guardrails.
export const MAX_UPLOAD_BYTES = 200 * 1024 * 1024; // whole file is held in memory
export const MAP_POINT_CAP = 20_000;
export const HIST_BINS = 50;
export const PREVIEW_ROWS = 10;
