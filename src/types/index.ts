/**
 * Type exports
 */

export * from "./session";
export * from "./dialog";
export * from "./retrieval";
export * from "./ai";
export * from "./language";
export * from "./coordinator";
export * from "./proverb";
