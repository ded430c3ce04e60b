import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";

/** 產生純色 JPEG 測試圖 */
export async function createJpeg(filePath: string, width: number, height: number) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 200, g: 120, b: 40 },
    },
  })
    .jpeg()
    .toFile(filePath);
  return filePath;
}

/** 副檔名是圖片但內容不是 */
export async function createBrokenImage(filePath: string) {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, "this is not an image");
  return filePath;
}
