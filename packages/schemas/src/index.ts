// Tool inputs
export * from "./mcp.js";

// Governance configuration
export * from "./governance.js";

// Errors and status reporting
export * from "./status.js";
