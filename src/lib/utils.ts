export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatConfig(ramGb: number, cpuCores: number, diskGb: number): string {
  return `${ramGb}GB RAM / ${cpuCores} CPU / ${diskGb}GB Disk`;
}

// yyyyMMddHHmmss in UTC, used for generated instance names.
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, "").slice(0, 14);
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}
