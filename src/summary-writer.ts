// Capture Guidance - Summary serialization
// Manifest and sidecar summaries are typed records; this writer knows nothing
// about their schema. Fields print in the order the record declares them,
// with a 2-space indent and a trailing newline.

function finiteOrNull(_key: string, value: unknown): unknown {
  if (typeof value === "number" && !Number.isFinite(value)) return null;
  return value;
}

/**
 * Serialize a summary to JSON. NaN and ±Infinity become null; empty objects
 * and arrays print as `{}` and `[]`. Integer-like keys (grid cells, tag ids)
 * come out in ascending numeric order, ahead of other keys.
 */
export function formatSummaryJson(summary: object): string {
  return `${JSON.stringify(summary, finiteOrNull, 2)}\n`;
}
