export * from "./agent.js";
export * from "./execution.js";
export * from "./ws-events.js";
