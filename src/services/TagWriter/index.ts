export * from "./TagBuilder";
export * from "./TagWriter";
export * from "./TagWriterExifTool";
