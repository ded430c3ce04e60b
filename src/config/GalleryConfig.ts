import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { defaultTemplatesDir } from "@/constants";

export const galleryConfigSchema = t.Object({
  /** 相片來源目錄 */
  sourceDir: t.String({ minLength: 1, default: "pictures" }),
  /** 網站輸出目錄 */
  outputDir: t.String({ minLength: 1, default: "output" }),
  resizeThreshold: t.Object(
    {
      /** 最長邊超過此像素就縮圖 */
      maxDimension: t.Integer({ minimum: 1, default: 800 }),
      /** 檔案大小超過此位元組數也縮圖 */
      maxBytes: t.Optional(t.Integer({ minimum: 1 })),
    },
    { default: {} }
  ),
  jpegQuality: t.Integer({ minimum: 1, maximum: 100, default: 85 }),
  /** 標題中出現此字時不縮圖、不套 lightbox */
  smallImageMarker: t.String({ pattern: "^[^\\s-]+$", default: "small" }),
  feedItemCount: t.Integer({ minimum: 0, default: 20 }),
  feedFormat: t.Union([t.Literal("rss"), t.Literal("atom")], {
    default: "rss",
  }),
  pageSize: t.Integer({ minimum: 1, default: 10 }),
  templatesDir: t.String({ minLength: 1, default: defaultTemplatesDir }),
  site: t.Object(
    {
      title: t.String({ minLength: 1, default: "Photography" }),
      baseUrl: t.String({ pattern: "^https?://", default: "http://localhost" }),
      author: t.Optional(t.String()),
      description: t.Optional(t.String()),
    },
    { default: {} }
  ),
});

export type GalleryConfig = Readonly<Static<typeof galleryConfigSchema>>;

export type ConfigLayer = Record<string, unknown>;

export type ConfigError = {
  type: "CONFIG_INVALID";
  message: string;
  details: string[];
};

/**
 * 組出整次執行共用的設定：schema 預設值 ← 設定檔 ← 命令列參數。
 * 回傳的設定已凍結，之後不會再變動。
 */
export async function loadGalleryConfig(options: {
  configFile?: string;
  overrides?: ConfigLayer;
}): Promise<Result<GalleryConfig, ConfigError>> {
  let fileLayer: ConfigLayer = {};
  if (options.configFile) {
    const read = await readConfigFile(options.configFile);
    if (isErr(read)) return read;
    fileLayer = read.value;
  }
  return buildGalleryConfig(mergeLayers(fileLayer, options.overrides ?? {}));
}

export function buildGalleryConfig(
  input: ConfigLayer
): Result<GalleryConfig, ConfigError> {
  const value = Value.Convert(
    galleryConfigSchema,
    Value.Default(galleryConfigSchema, Value.Clone(input))
  );
  if (!Value.Check(galleryConfigSchema, value)) {
    const details = [...Value.Errors(galleryConfigSchema, value)].map(
      (e) => `${e.path || "/"}: ${e.message}`
    );
    return err({
      type: "CONFIG_INVALID",
      message: `設定不正確：${details.join("; ")}`,
      details,
    });
  }
  Object.freeze(value.resizeThreshold);
  Object.freeze(value.site);
  return ok(Object.freeze(value));
}

async function readConfigFile(
  file: string
): Promise<Result<ConfigLayer, ConfigError>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, "utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return err({
      type: "CONFIG_INVALID",
      message: `無法讀取設定檔 ${file}: ${reason}`,
      details: [reason],
    });
  }
  if (!isPlainObject(parsed)) {
    return err({
      type: "CONFIG_INVALID",
      message: `設定檔內容必須是 JSON 物件: ${file}`,
      details: [],
    });
  }
  return ok(parsed);
}

/** 後面的層覆蓋前面的層；undefined 視為未設定 */
export function mergeLayers(base: ConfigLayer, layer: ConfigLayer) {
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(value)
      ? mergeLayers(isPlainObject(current) ? current : {}, value)
      : value;
  }
  return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
