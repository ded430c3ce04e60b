import { type Result, err } from "~shared/utils/Result";

import type { FeedError, FeedGenerator } from "@/services/FeedGenerator";

/** 一律回傳序列化失敗的 feed 產生器 */
export class FeedGeneratorFailing implements FeedGenerator {
  generate(): Result<string, FeedError> {
    return err({
      type: "FEED_SERIALIZATION_FAILED",
      message: "Simulated feed failure",
    });
  }
}
