/**
 * Agent Runtime Core
 *
 * Domain types, collaborator contracts, the error taxonomy and runtime
 * configuration shared by every runtime package.
 */

export * from "./config";
export * from "./contracts";
export * from "./errors";
export * from "./events";
export * from "./goals";
export * from "./schemas";
export * from "./tiers";
export * from "./types";
