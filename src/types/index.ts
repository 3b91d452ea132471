export * from "./models";
export * from "./status";
