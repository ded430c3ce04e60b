import type { Result } from "~shared/utils/Result";

import type { PhotoRecord } from "@/types";

export type FeedError = {
  type: "FEED_SERIALIZATION_FAILED";
  message: string;
};

export interface FeedGenerator {
  /** records 應為已排序的最新 N 筆，每張相片一個 item */
  generate(records: readonly PhotoRecord[]): Result<string, FeedError>;
}
