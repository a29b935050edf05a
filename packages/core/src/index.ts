export * as Sizer from "./tree_sizer";
export * as Partitioner from "./partitioner";
export * as Config from "./config";
export * as Errors from "./errors";
export * as Logger from "./logger";

// Scanning
export * as Executor from "./scan_executor";
export * as Runner from "./scan_runner";
