export * from "./env";
export * from "./errors";
export type * from "./types";
export * from "./snapshots/schema";
export * from "./snapshots/store";
export * from "./tasks/ecosystem/data-config";
export * from "./tasks/ecosystem/analyze";
export * from "./tasks/ecosystem/collect";
export * from "./tasks/ecosystem/ecosystem.reports";
