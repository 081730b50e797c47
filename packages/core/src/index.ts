export * from "./provider";
export * from "./vm-spec";
export * from "./resource";
export * from "./errors";
export * from "./redact";
export * from "./config";
export * from "./logger";
export * from "./constants";

export const VMFORGE_VERSION = "0.1.0";
