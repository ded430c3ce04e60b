import { ExifDateTime } from "exiftool-vendored";

const RAW_BASIC_RE = /^(\d{4}):(\d{2}):(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/;

/**
 * 將 EXIF 時間轉為 JS Date。
 * 規則：
 * 1) 若 rawValue = "YYYY:MM:DD HH:mm:ss" 且具 tzoffsetMinutes，使用 raw + tzoffsetMinutes 建立正確的 UTC 時間。
 * 2) 沒有時區的 raw 字串視為 UTC。
 * 3) 否則 fallback 使用 time.toDate()。
 * 4) 無效資料回傳 undefined。
 */
export function getTime(time: unknown): Date | undefined {
  if (!time) return undefined;
  if (typeof time === "string") return fromRawString(time, undefined);
  if (!(time instanceof ExifDateTime) || !time.isValid) return undefined;

  if (time.rawValue) {
    const d = fromRawString(time.rawValue, time.tzoffsetMinutes);
    if (d) return d;
  }

  // fallback：交給 exiftool 的內建轉換
  const d = time.toDate();
  return Number.isNaN(d.getTime()) ? undefined : d;
}

function fromRawString(raw: string, tz: number | undefined) {
  const m = RAW_BASIC_RE.exec(raw.trim());
  if (!m) {
    // 非 EXIF 格式時交給 Date 解析（例如 ISO 字串）
    const d = new Date(raw);
    return Number.isNaN(d.getTime()) ? undefined : d;
  }
  const [year, month, day, hour, minute, second] = m.slice(1).map(Number);
  // 先當作「目標時區的本地時間」建立 UTC 毫秒，再扣掉偏移，得到正確的 UTC 時間點
  // 例：raw=2025:07:23 18:26:02 且 tz=+480(UTC+8) → UTC 10:26:02
  const offset = typeof tz === "number" && Number.isFinite(tz) ? tz : 0;
  const baseUtcMs = Date.UTC(year, month - 1, day, hour, minute, second, 0);
  // Date.UTC 會把 2021:02:30 進位成 3/2，這裡擋掉
  const base = new Date(baseUtcMs);
  if (
    base.getUTCFullYear() !== year ||
    base.getUTCMonth() !== month - 1 ||
    base.getUTCDate() !== day
  ) {
    return undefined;
  }
  return new Date(baseUtcMs - offset * 60 * 1000);
}
