import { expect } from "vitest";

export function expectHasSubset<T extends object>(
  actual: T,
  subset: Partial<T>
) {
  expect(actual).toMatchObject(subset);
}
