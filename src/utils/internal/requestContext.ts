/**
 * @fileoverview Utilities for creating and managing request contexts.
 * A request context carries a unique request ID and a timestamp, plus any
 * operation-specific fields, and is attached to every log entry.
 * @module src/utils/internal/requestContext
 */

import { randomUUID } from "node:crypto";

/**
 * Context object threaded through a single operation for logging and tracing.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  [key: string]: unknown;
}

export const requestContextService = {
  /**
   * Creates a new request context with a fresh `requestId` and `timestamp`.
   * Additional fields are spread in after the generated ones, so a caller may
   * carry an existing `requestId` forward.
   */
  createRequestContext(
    additionalContext: Record<string, unknown> = {},
  ): RequestContext {
    return {
      requestId: randomUUID(),
      timestamp: new Date().toISOString(),
      ...additionalContext,
    };
  },
};
