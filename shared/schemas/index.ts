export * from "./market.schema";
export * from "./agent.schema";
export * from "./report.schema";
