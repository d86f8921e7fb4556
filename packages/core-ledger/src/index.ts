export * from "./store";
export * from "./settlement-ledger";
export * from "./coin-request-ledger";
export * from "./account-ledger";
