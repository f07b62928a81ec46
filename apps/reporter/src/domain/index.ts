/**
 * Domain layer - pure logic with no I/O.
 */

// Buffer management
export * from "./buffer/index.js";

// Request samples
export * from "./sample/index.js";

// Run identity
export * from "./run/index.js";
