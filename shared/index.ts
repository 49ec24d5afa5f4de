// Schemas (with Zod validators)
export * from "./schemas";

// Types (TypeScript types only)
export * from "./types";

// Enums (runtime validators)
export * from "./enums";
