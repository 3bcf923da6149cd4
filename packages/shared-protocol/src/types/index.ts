// Shared TypeScript types and identifiers
// Used by both server and client when describing unit properties and spells

export * from "./property.js";
export * from "./spell.js";
