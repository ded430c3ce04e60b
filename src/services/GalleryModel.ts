import type { PhotoRecord } from "@/types";

export type DateGroup = {
  /** yyyy-MM-dd */
  date: string;
  records: readonly PhotoRecord[];
};

export type GalleryPage = {
  /** 從 0 開始 */
  index: number;
  total: number;
  records: readonly PhotoRecord[];
  groups: readonly DateGroup[];
};

/**
 * 已排序（日期新到舊、同日依檔名）的相片集合，建立後唯讀。
 */
export class GalleryModel {
  readonly records: readonly PhotoRecord[];
  readonly groups: readonly DateGroup[];

  constructor(sortedRecords: readonly PhotoRecord[]) {
    this.records = Object.freeze([...sortedRecords]);
    this.groups = groupConsecutive(this.records);
  }

  get size() {
    return this.records.length;
  }

  mostRecent(count: number): readonly PhotoRecord[] {
    return this.records.slice(0, Math.max(0, count));
  }

  /** 依 pageSize 分頁；沒有相片時仍回傳一個空白頁 */
  paginate(pageSize: number): GalleryPage[] {
    const size = Math.max(1, Math.floor(pageSize));
    const total = Math.max(1, Math.ceil(this.records.length / size));
    return Array.from({ length: total }, (_, index) => {
      const records = Object.freeze(
        this.records.slice(index * size, (index + 1) * size)
      );
      return Object.freeze({
        index,
        total,
        records,
        groups: groupConsecutive(records),
      });
    });
  }
}

function groupConsecutive(records: readonly PhotoRecord[]) {
  const groups: { date: string; records: PhotoRecord[] }[] = [];
  let current: { date: string; records: PhotoRecord[] } | undefined;
  for (const record of records) {
    if (!current || current.date !== record.date) {
      current = { date: record.date, records: [] };
      groups.push(current);
    }
    current.records.push(record);
  }
  return Object.freeze(
    groups.map(
      (g): DateGroup =>
        Object.freeze({ date: g.date, records: Object.freeze(g.records) })
    )
  );
}
