export * from "./issue.js";
export * from "./config.js";
