export * from "./system";
export * from "./state-store";
export * from "./lottery.service";
export * from "./lottery-core.module";
