export * from "./types";
export * from "./types/chart";
export * from "./indicators";
export * from "./schemas";
export * from "./env";
export * from "./utils/time";
export * from "./perf/metrics";
