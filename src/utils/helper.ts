import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/** 取得檔案修改時間（毫秒），檔案不存在時回傳 undefined */
export async function mtimeOf(p: string) {
  try {
    return (await stat(p)).mtimeMs;
  } catch {
    return undefined;
  }
}

/** 轉成網站內使用的相對 POSIX 路徑 */
export function toSitePath(...segments: string[]) {
  return path.posix.join(...segments.map((s) => s.split(path.sep).join("/")));
}
