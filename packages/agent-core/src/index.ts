export * from "./contract/interface.js";
export * from "./validation/schema.js";
export * from "./validation/rules.js";
export * from "./oracle/decision.js";
export * from "./oracle/rotating.js";
export * from "./oracle/http.js";
export * from "./chain/contract-caller.js";
export * from "./chain/state-reader.js";
export * from "./utils/json.js";
export * from "./utils/timeout.js";
