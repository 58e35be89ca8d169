export * from "./types";
export * from "./config";
export * from "./signature";
export * from "./alerts";
export * from "./utils/time";
export * from "./dedup/stateStore";
export * from "./dedup/alertDeduplicator";
export * from "./metrics/scanner";
export * from "./metrics/thresholds";
export * from "./metrics/health";
export * from "./metrics/check";
export * from "./report/artifactIntegrity";
export * from "./report/retryGuides";
export * from "./report/opsReport";
export { CliUsageError, runCli } from "./cli";
