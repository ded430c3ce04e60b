import { rm } from "node:fs/promises";
import path from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { buildGalleryConfig } from "@/config/GalleryConfig";
import { FileNameParserDefault } from "@/services/FileNameParser";
import { ImageResizerSharp } from "@/services/ImageResizer";
import { PhotoRecordServiceDefault } from "@/services/PhotoRecordServiceDefault";
import { exists } from "@/utils/helper";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { createBrokenImage, createJpeg } from "~test/helpers/images";

const tmpDir = "test/tmp/record-service";
const srcDir = path.join(tmpDir, "src");
const outDir = path.join(tmpDir, "out");

function buildService(exifService: ExifServiceFake) {
  const config = buildGalleryConfig({
    sourceDir: srcDir,
    outputDir: outDir,
    smallImageMarker: "small",
  });
  expectOk(config);
  const logger = buildTestLogger();
  return new PhotoRecordServiceDefault({
    parser: new FileNameParserDefault(config.value),
    exifService,
    resizer: new ImageResizerSharp({ jpegQuality: 85, logger }),
    config: config.value,
    logger,
  });
}

describe("PhotoRecordServiceDefault", () => {
  const wide = path.join(srcDir, "2021-06-01-sunset.jpg");
  const tiny = path.join(srcDir, "2020-01-01-test.jpg");
  const marked = path.join(srcDir, "2021-06-02-hike-small-trail.jpg");
  const broken = path.join(srcDir, "2021-06-03-broken.jpg");
  const malformed = path.join(srcDir, "sunset.jpg");
  const brokenMarked = path.join(srcDir, "2021-06-05-cave-small-dark.jpg");
  const sunriseJpg = path.join(srcDir, "2021-06-06-sunrise.jpg");
  const sunrisePng = path.join(srcDir, "2021-06-06-sunrise.png");
  const twinJpg = path.join(srcDir, "2021-06-07-twin.jpg");
  const twinPng = path.join(srcDir, "2021-06-07-twin.png");

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await createJpeg(wide, 2000, 1000);
    await createJpeg(tiny, 300, 200);
    await createJpeg(marked, 1600, 1200);
    await createBrokenImage(broken);
    await createJpeg(malformed, 100, 100);
    await createBrokenImage(brokenMarked);
    await createJpeg(sunriseJpg, 300, 200);
    await createJpeg(sunrisePng, 300, 200);
    await createBrokenImage(twinJpg);
    await createJpeg(twinPng, 300, 200);
  });

  test("分組日期以檔名為準，EXIF 時間保留顯示", async () => {
    const exif = new ExifServiceFake();
    const captureTime = new Date("2020-01-02T10:00:00.000Z");
    exif.setExif(tiny, {
      filePath: tiny,
      captureTime,
      cameraModel: "TestCam",
      aperture: 2.8,
      gps: { latitude: 25.04, longitude: 121.56 },
    });
    const result = await buildService(exif).collect([tiny]);

    expect(result.issues).toEqual([]);
    expect(result.notices).toEqual([]);
    expect(result.records).toEqual([
      {
        sourcePath: tiny,
        fileName: "2020-01-01-test.jpg",
        slug: "2020-01-01-test",
        date: "2020-01-01",
        title: "test",
        suppressLightbox: false,
        exif: { captureTime, cameraModel: "TestCam", aperture: 2.8 },
        camera: "TestCam",
        gps: { latitude: 25.04, longitude: 121.56 },
        imagePath: "pictures/2020-01-01-test.jpg",
        resizedPath: undefined,
      },
    ]);
    expect(result.resize).toEqual({ resized: 0, cached: 0, notNeeded: 1 });
  });

  test("讀不到 EXIF 只記錄 notice，相片照常收錄", async () => {
    const exif = new ExifServiceFake();
    exif.setReadError(wide, { type: "READ_FAILED", message: "exiftool 逾時" });
    const result = await buildService(exif).collect([wide]);

    expect(result.records).toHaveLength(1);
    expect(result.records[0].exif).toBeUndefined();
    expect(result.notices).toEqual([
      {
        filePath: wide,
        type: "METADATA_READ_FAILED",
        reason: "READ_FAILED",
        message: "exiftool 逾時",
      },
    ]);
  });

  test("大圖產生縮圖並複製原圖", async () => {
    const result = await buildService(new ExifServiceFake()).collect([wide]);
    const [record] = result.records;
    expect(record.resizedPath).toBe("pictures/resized/2021-06-01-sunset.800px.jpg");
    expect(record.imagePath).toBe("pictures/2021-06-01-sunset.jpg");
    expect(
      await exists(path.join(outDir, "pictures", "resized", "2021-06-01-sunset.800px.jpg"))
    ).toBe(true);
    expect(await exists(path.join(outDir, "pictures", "2021-06-01-sunset.jpg"))).toBe(true);
    expect(Object.isFrozen(record)).toBe(true);
  });

  test("有標記字的相片不縮圖", async () => {
    const result = await buildService(new ExifServiceFake()).collect([marked]);
    const [record] = result.records;
    expect(record.suppressLightbox).toBe(true);
    expect(record.title).toBe("hike trail");
    expect(record.resizedPath).toBeUndefined();
    expect(result.resize).toEqual({ resized: 0, cached: 0, notNeeded: 0 });
    expect(
      await exists(path.join(outDir, "pictures", "resized", "2021-06-02-hike-small-trail.800px.jpg"))
    ).toBe(false);
  });

  test("檔名不符與無法解碼的檔案被排除，其餘照常處理", async () => {
    const exif = new ExifServiceFake();
    const result = await buildService(exif).collect([malformed, broken, tiny]);

    expect(result.records.map((r) => r.fileName)).toEqual(["2020-01-01-test.jpg"]);
    expect(result.issues.map((i) => [path.basename(i.filePath), i.type])).toEqual([
      ["sunset.jpg", "INVALID_FILENAME"],
      ["2021-06-03-broken.jpg", "IMAGE_DECODE_FAILED"],
    ]);
    // 檔名不符的檔案不會再往下讀 EXIF
    expect(exif.reads).toEqual([broken, tiny]);
  });

  test("有標記字的壞檔也會被排除", async () => {
    const result = await buildService(new ExifServiceFake()).collect([
      brokenMarked,
    ]);
    expect(result.records).toEqual([]);
    expect(result.issues.map((i) => [i.filePath, i.type])).toEqual([
      [brokenMarked, "IMAGE_DECODE_FAILED"],
    ]);
    expect(
      await exists(path.join(outDir, "pictures", "2021-06-05-cave-small-dark.jpg"))
    ).toBe(false);
  });

  test("slug 重複時只輸出排序在前者的檔案", async () => {
    const result = await buildService(new ExifServiceFake()).collect([
      sunrisePng,
      sunriseJpg,
    ]);
    expect(result.records.map((r) => r.fileName)).toEqual([
      "2021-06-06-sunrise.jpg",
    ]);
    expect(result.issues).toEqual([
      {
        filePath: sunrisePng,
        type: "DUPLICATE_SLUG",
        message: "頁面名稱 2021-06-06-sunrise 與 2021-06-06-sunrise.jpg 重複",
      },
    ]);
    expect(
      await exists(path.join(outDir, "pictures", "2021-06-06-sunrise.png"))
    ).toBe(false);
  });

  test("排序在前的檔案壞掉時由同名的下一個檔案遞補", async () => {
    const result = await buildService(new ExifServiceFake()).collect([
      twinPng,
      twinJpg,
    ]);
    expect(result.records.map((r) => r.fileName)).toEqual(["2021-06-07-twin.png"]);
    expect(result.issues.map((i) => [i.filePath, i.type])).toEqual([
      [twinJpg, "IMAGE_DECODE_FAILED"],
    ]);
  });
});
