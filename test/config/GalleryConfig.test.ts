import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";
import { expectHasSubset } from "~shared/testkit/ExpectSubset";

import {
  buildGalleryConfig,
  loadGalleryConfig,
  mergeLayers,
} from "@/config/GalleryConfig";
import { defaultTemplatesDir } from "@/constants";

const tmpDir = "test/tmp/config";

describe("buildGalleryConfig", () => {
  test("空白輸入套用全部預設值", () => {
    const result = buildGalleryConfig({});
    expectOk(result);
    expect(result.value).toEqual({
      sourceDir: "pictures",
      outputDir: "output",
      resizeThreshold: { maxDimension: 800 },
      jpegQuality: 85,
      smallImageMarker: "small",
      feedItemCount: 20,
      feedFormat: "rss",
      pageSize: 10,
      templatesDir: defaultTemplatesDir,
      site: { title: "Photography", baseUrl: "http://localhost" },
    });
  });

  test("命令列字串轉成數字", () => {
    const result = buildGalleryConfig({
      resizeThreshold: { maxDimension: "600", maxBytes: "250000" },
      pageSize: "5",
    });
    expectOk(result);
    expectHasSubset(result.value, {
      resizeThreshold: { maxDimension: 600, maxBytes: 250000 },
      pageSize: 5,
    });
  });

  test("設定凍結後不可修改", () => {
    const result = buildGalleryConfig({});
    expectOk(result);
    expect(Object.isFrozen(result.value)).toBe(true);
    expect(Object.isFrozen(result.value.site)).toBe(true);
    expect(Object.isFrozen(result.value.resizeThreshold)).toBe(true);
  });

  test("列出所有不正確的欄位", () => {
    const result = buildGalleryConfig({
      feedFormat: "json",
      smallImageMarker: "two-words",
      site: { baseUrl: "photos.test" },
    });
    expectErr(result);
    expect(result.error.type).toBe("CONFIG_INVALID");
    const paths = result.error.details.map((d) => d.split(":")[0]);
    expect(paths).toContain("/feedFormat");
    expect(paths).toContain("/smallImageMarker");
    expect(paths).toContain("/site/baseUrl");
  });
});

describe("mergeLayers", () => {
  test("後面的層覆蓋前面，undefined 不覆蓋", () => {
    expect(
      mergeLayers(
        { outputDir: "a", site: { title: "T", baseUrl: "https://a.test" } },
        { outputDir: undefined, site: { title: "U", author: undefined } }
      )
    ).toEqual({
      outputDir: "a",
      site: { title: "U", baseUrl: "https://a.test" },
    });
  });
});

describe("loadGalleryConfig", () => {
  const configFile = path.join(tmpDir, "gallery.json");

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(
      configFile,
      JSON.stringify({
        outputDir: "public",
        pageSize: 4,
        site: { title: "From file", baseUrl: "https://photos.test" },
      })
    );
    await writeFile(path.join(tmpDir, "broken.json"), "{ not json");
  });

  test("設定檔之上再套命令列參數", async () => {
    const result = await loadGalleryConfig({
      configFile,
      overrides: { pageSize: 8, site: { title: "From flag" } },
    });
    expectOk(result);
    expectHasSubset(result.value, {
      outputDir: "public",
      pageSize: 8,
      site: { title: "From flag", baseUrl: "https://photos.test" },
    });
  });

  test("設定檔不是 JSON", async () => {
    const result = await loadGalleryConfig({
      configFile: path.join(tmpDir, "broken.json"),
    });
    expectErr(result);
    expect(result.error.type).toBe("CONFIG_INVALID");
  });

  test("設定檔不存在", async () => {
    const result = await loadGalleryConfig({
      configFile: path.join(tmpDir, "missing.json"),
    });
    expectErr(result);
    expect(result.error.message).toContain("無法讀取設定檔");
  });
});
