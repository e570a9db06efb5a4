export * from "./ExportOrchestrator";
export * from "./ExportOrchestratorDefault";
