// Model public API - foundation types (imports nothing outside model/)

// AST - accessor expression nodes and guards
export * from "./ast.js";
