export * from "./gateway";
export * from "./seeded-oracle";
