/**
 * @fileoverview Barrel file for shared utilities.
 * @module src/utils/index
 */

export * from "./internal/errorHandler.js";
export * from "./internal/logger.js";
export * from "./internal/performance.js";
export * from "./internal/requestContext.js";
export * from "./security/sanitization.js";
