export * from "./FileIndex";
export * from "./FileSystemScanner";
export * from "./FileSystemScannerDefault";
