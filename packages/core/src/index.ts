export * from "./constants";
export * from "./errors";
export * from "./config";
export * from "./reconciler";
export * from "./retry";
export * from "./report";
export * from "./orchestrator";
export * from "./simulated/simulated-provider";

export const GPUFLEET_VERSION = "0.1.0";
