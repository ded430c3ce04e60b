import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

const tmpDir = "test/tmp/scanner";

describe("FileSystemScannerDefault", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "subdir"), { recursive: true });
    await writeFile(join(tmpDir, "b.JPG"), "b");
    await writeFile(join(tmpDir, "a.txt"), "a");
    await writeFile(join(tmpDir, "c.png"), "c");
    await writeFile(join(tmpDir, ".hidden.jpg"), "h");
    await writeFile(join(tmpDir, "subdir", "d.jpg"), "d");
  });

  test("預設只列出第一層，略過隱藏檔並排序", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir);
    expectOk(result);
    expect(result.value).toEqual([
      join(tmpDir, "a.txt"),
      join(tmpDir, "b.JPG"),
      join(tmpDir, "c.png"),
    ]);
  });

  test("能遞迴列出所有檔案", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { recursive: true });
    expectOk(result);
    expect(result.value).toHaveLength(4);
    expect(result.value).toContain(join(tmpDir, "subdir", "d.jpg"));
  });

  test("副檔名過濾不分大小寫，可帶或不帶點", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir, { allowExts: ["jpg", ".PNG"] });
    expectOk(result);
    expect(result.value).toEqual([
      join(tmpDir, "b.JPG"),
      join(tmpDir, "c.png"),
    ]);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan("no_such_path");
    expectErr(result);
    expect(result.error.type).toBe("SCAN_FAILED");
  });
});
