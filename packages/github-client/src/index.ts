export * from "./client";
export * from "./paginate";
export * from "./queries";
export type * from "./types";
