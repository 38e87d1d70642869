export * from "./mcp.js";
export * from "./domain.js";
