export * from "./MediaProcessor";
export * from "./MediaProcessorDefault";
