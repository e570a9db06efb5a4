export * from "./ProcessingStateStore";
export * from "./ProcessingStateStoreJson";
