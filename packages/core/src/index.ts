export * from "./constants";
export * from "./types";
export * from "./interfaces";
export * from "./errors";
export * from "./spoke/key-value-list";
export * from "./spoke/position-status";
export * from "./spoke/premium";
export * from "./spoke/account-data";
export * from "./spoke/liquidation";
export * from "./spoke/validation";
export * from "./spoke/events";
export * from "./spoke/store";
export * from "./spoke/spoke";
export * from "./hub/in-memory-hub";
export * from "./oracle/in-memory-oracle";
