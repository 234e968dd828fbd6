export * from "./can";
export * from "./stream";
export * from "./dtc";
export * from "./obd";
export * from "./transport/types";
export * from "./transport/virtual-bus";
export * from "./transport/bridge-client";
