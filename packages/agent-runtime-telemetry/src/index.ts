/**
 * Agent Runtime Telemetry
 *
 * Structured logging utilities.
 */

export * from "./logging";
