export * from "./documentProcessor";
export * from "./queries";
export * from "./tempIntake";
