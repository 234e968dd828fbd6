export * from "./reader";
export * from "./config";
export * from "./dashboard";
export * from "./menu";
