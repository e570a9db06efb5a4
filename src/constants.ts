/** sidecar 副檔名，區分大小寫 */
export const SIDECAR_EXTENSION = ".json";

/** 匯出工具截斷檔名的上限（UTF-8 位元組） */
export const MAX_FILENAME_BYTES = 51;

/** 依序嘗試的檔名後綴，空字串代表原檔 */
export const DEFAULT_SUFFIXES = ["", "-edited"] as const;

/** 動態相片的影片附檔 */
export const motionPhotoExtensions = [".mp", ".mp~2"] as const;

export const PROCESSED_DIR_NAME = "Processed";
export const UNMATCHED_DIR_NAME = "Unprocessed";

/** 輸出目錄內存放狀態與報告的資料夾 */
export const META_DIR_NAME = "_reconcile";
export const STATE_FILE_NAME = "processing_state.json";

/** 未指定目標時：`<來源>_reconciled` */
export const DEFAULT_DESTINATION_SUFFIX = "_reconciled";

export const DEFAULT_STATE_SAVE_INTERVAL = 100;
export const DEFAULT_TAG_WRITE_TIMEOUT_MS = 30_000;
