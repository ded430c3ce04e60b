import type { GpsCoordinates } from "@/types";

const NUMBER_RE = /-?\d+(?:\.\d+)?(?:\/\d+(?:\.\d+)?)?/g;

/**
 * 將 EXIF 的度/分/秒轉為十進位度。可接受：
 * - 數字：37.7749
 * - 陣列：[37, 46, 29.64]
 * - 字串：`37 deg 46' 29.64" N`、`37,46,29.64`、`37/1 46/1 2964/100`
 * 方位（ref 或字串結尾的 N/S/E/W）為 S、W 時取負值。
 */
export function toDecimalDegrees(
  value: unknown,
  ref?: unknown
): number | undefined {
  let parts: number[];
  let hemisphere = typeof ref === "string" ? ref.trim().toUpperCase() : "";

  if (typeof value === "number") {
    parts = [value];
  } else if (Array.isArray(value)) {
    parts = value.map((v) => (typeof v === "number" ? v : parseRational(v)));
  } else if (typeof value === "string") {
    parts = (value.match(NUMBER_RE) ?? []).map(parseRational);
    const suffix = /([NSEW])\s*$/i.exec(value);
    if (suffix && !hemisphere) hemisphere = suffix[1].toUpperCase();
  } else {
    return undefined;
  }

  if (parts.length === 0 || parts.length > 3) return undefined;
  if (parts.some((p) => !Number.isFinite(p))) return undefined;

  const [degrees, minutes = 0, seconds = 0] = parts;
  if (minutes < 0 || minutes >= 60 || seconds < 0 || seconds >= 60) {
    return undefined;
  }
  const magnitude = Math.abs(degrees) + minutes / 60 + seconds / 3600;
  const negative =
    degrees < 0 || hemisphere.startsWith("S") || hemisphere.startsWith("W");
  return negative ? -magnitude : magnitude;
}

export function toGpsCoordinates(tags: {
  latitude: unknown;
  latitudeRef?: unknown;
  longitude: unknown;
  longitudeRef?: unknown;
}): GpsCoordinates | undefined {
  const latitude = toDecimalDegrees(tags.latitude, tags.latitudeRef);
  const longitude = toDecimalDegrees(tags.longitude, tags.longitudeRef);
  if (latitude === undefined || longitude === undefined) return undefined;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return undefined;
  return { latitude, longitude };
}

function parseRational(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value !== "string") return Number.NaN;
  const [numerator, denominator] = value.split("/");
  if (denominator === undefined) return Number(numerator);
  return Number(numerator) / Number(denominator);
}
