import type { Result } from "../utils/Result";

export interface DumpWriter {
  /**
   * 將資料以 JSON 輸出為報告檔。
   * 成功時回傳檔案路徑。
   */
  dump(name: string, data: unknown): Promise<Result<string, Error>>;
}
