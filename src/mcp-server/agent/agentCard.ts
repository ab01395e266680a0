/**
 * @fileoverview Descriptive types for the agent and its entrypoints.
 * @module src/mcp-server/agent/agentCard
 */

import { z } from "zod";

/**
 * A named operation the agent exposes. `id` doubles as the MCP tool name.
 */
export interface AgentEntrypoint<
  Schema extends z.AnyZodObject = z.AnyZodObject,
> {
  id: string;
  title: string;
  description: string;
  parameters: Schema;
}

export interface AgentCard {
  name: string;
  description: string;
  icon: string | null;
  entrypoints: AgentEntrypoint[];
}
