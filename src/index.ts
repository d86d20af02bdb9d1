/**
 * snaplog
 *
 * Access library for per-connection TCP instrumentation counters, including:
 * - Schema parsing into a catalogue of groups and typed fields
 * - Live attachment to the instrumentation tree and connection discovery
 * - Snapshots of group bytes, with typed reads and wrapping deltas
 * - Binary logs that embed their schema, with writer and replaying reader
 * - Flattening of replayed records into named values
 */

// Core utilities
export * from "./core";

// Schema catalogue and connections
export * from "./catalogue";

// Snapshots
export * from "./snapshot";

// Log files
export * from "./log";

// Live sources
export * from "./source";
