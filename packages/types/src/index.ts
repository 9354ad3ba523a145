export * from "./ledger.schema.js";
export * from "./config.schema.js";
