export * from "./api/errors";
export * from "./api/analysis";
export * from "./env";
export * from "./logger";
export * from "./queue";
