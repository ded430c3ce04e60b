import { type Static, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/**
 * 建立從環境變數讀取設定的工廠。
 * 第一次呼叫時轉型並驗證，之後回傳同一份凍結的設定。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Record<string, string | undefined> = process.env
): () => Readonly<Static<T>> {
  let cached: Readonly<Static<T>> | undefined;
  return () => {
    if (cached) return cached;
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const converted = Value.Convert(schema, Value.Default(schema, picked));
    if (!Value.Check(schema, converted)) {
      const detail = [...Value.Errors(schema, converted)]
        .map((e) => `${e.path}: ${e.message}`)
        .join("; ");
      throw new Error(`環境變數設定錯誤: ${detail}`);
    }
    cached = Object.freeze(converted);
    return cached;
  };
}

export function envBoolean() {
  return t.Boolean();
}

export function envNumber(options?: { minimum?: number; maximum?: number }) {
  return t.Number(options);
}
