import { describe, expect, test } from "vitest";

import { type Result, err, isErr, isOk, ok } from "~shared/utils/Result";

function half(n: number): Result<number, string> {
  return n % 2 === 0 ? ok(n / 2) : err(`${n} 不是偶數`);
}

describe("Result", () => {
  test("isOk 與 isErr 互斥", () => {
    const good = half(4);
    const bad = half(3);
    expect([isOk(good), isErr(good)]).toEqual([true, false]);
    expect([isOk(bad), isErr(bad)]).toEqual([false, true]);
  });

  test("型別守衛可取出值或錯誤", () => {
    const good = half(8);
    expect(isOk(good) ? good.value : undefined).toBe(4);
    const bad = half(5);
    expect(isErr(bad) ? bad.error : undefined).toBe("5 不是偶數");
  });

  test("ok() 不帶值", () => {
    expect(ok()).toEqual({ ok: true, value: undefined });
  });
});
