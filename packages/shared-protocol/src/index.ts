// Shared protocol package: identifiers, schemas and helpers for server and client.

export * from "./schemas/index.js";
export * from "./types/index.js";
export * from "./constants/index.js";
export * from "./utils/number.js";
