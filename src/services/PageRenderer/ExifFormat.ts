/** 1/100 → 1/100s、0.5 → 0.5s、0.004 → 1/250s */
export function formatExposureTime(value: string) {
  if (value.includes("/")) return `${value}s`;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) return value;
  if (n >= 0.3) return `${n}s`;
  return `1/${Math.round(1 / n)}s`;
}

export function formatAperture(value: number) {
  return `f/${value}`;
}

/** "35.0 mm" → 35mm */
export function formatFocalLength(value: string) {
  const n = Number.parseFloat(value);
  return Number.isFinite(n) ? `${n}mm` : value;
}

export function formatIso(value: number) {
  return `ISO ${value}`;
}

export function formatCaptureTime(value: Date) {
  return `${value.toISOString().slice(0, 19).replace("T", " ")} (UTC)`;
}

export function formatCoordinate(value: number) {
  return value.toFixed(6);
}
