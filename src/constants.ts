import { fileURLToPath } from "node:url";

export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const imageExtensions = [
  ...jpgExtensions,
  ".png",
  ".webp",
  ".tif",
  ".tiff",
] as const;

/** 隨專案附帶的 nunjucks 樣板 */
export const defaultTemplatesDir = fileURLToPath(
  new URL("../templates", import.meta.url)
);

export const picturesDirName = "pictures";
export const resizedDirName = "resized";
export const feedFileName = "feed.xml";
export const feedGeneratorName = "photo-gallery";
