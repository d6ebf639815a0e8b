export * from "./entities/settings";
export * from "./entities/prefix-set";
export * from "./entities/digest-entry";
export * from "./entities/dispatch-outcome";
export * from "./value-objects/digest-algorithm";
