export * from "./SidecarReader";
export * from "./SidecarReaderJson";
