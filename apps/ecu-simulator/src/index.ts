export * from "./config";
export * from "./dtc/store";
export * from "./dtc/generator";
export * from "./services/dispatcher";
export * from "./services/service-loop";
export * from "./bridge/server";
export * from "./simulator";
