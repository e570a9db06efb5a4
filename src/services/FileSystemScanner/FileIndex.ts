import type { MediaRecord } from "@/types";
import { normalizeFileName } from "@/utils/helper";

/**
 * (相簿, 檔名) → MediaRecord[]。
 * 同一個 key 可能對應多個實體檔案，全部保留並維持加入順序。
 */
export class FileIndex {
  private readonly albums = new Map<string, Map<string, MediaRecord[]>>();
  private count = 0;

  static fromRecords(records: Iterable<MediaRecord>) {
    const index = new FileIndex();
    for (const record of records) index.add(record);
    return index;
  }

  add(record: MediaRecord) {
    const album = normalizeFileName(record.albumName);
    const name = normalizeFileName(record.fileName);
    let files = this.albums.get(album);
    if (!files) {
      files = new Map();
      this.albums.set(album, files);
    }
    const list = files.get(name);
    if (list) list.push(record);
    else files.set(name, [record]);
    this.count++;
  }

  /** 找不到時回傳 undefined，與「找到 0 筆」區分 */
  get(albumName: string, fileName: string): readonly MediaRecord[] | undefined {
    return this.albums
      .get(normalizeFileName(albumName))
      ?.get(normalizeFileName(fileName));
  }

  has(albumName: string, fileName: string) {
    return this.get(albumName, fileName) !== undefined;
  }

  /** 不同 key 的數量 */
  get keyCount() {
    let n = 0;
    for (const files of this.albums.values()) n += files.size;
    return n;
  }

  /** 全部 MediaRecord 數量（含重複） */
  get recordCount() {
    return this.count;
  }

  get albumCount() {
    return this.albums.size;
  }
}
