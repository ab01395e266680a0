/**
 * @fileoverview The Nucleotide agent: its card, and dispatch from an
 * entrypoint id to the matching tool logic.
 * @module src/mcp-server/agent/nucleotideAgent
 */

import {
  getNcbiService,
  NcbiService,
} from "../../services/NCBI/core/ncbiService.js";
import { BaseErrorCode, McpError } from "../../types-global/errors.js";
import { RequestContext } from "../../utils/index.js";
import {
  findSequenceRecordsEntrypoint,
  findSequenceRecordsLogic,
} from "../tools/findSequenceRecords/logic.js";
import {
  getSequenceRecordEntrypoint,
  getSequenceRecordLogic,
} from "../tools/getSequenceRecord/logic.js";
import { AgentCard } from "./agentCard.js";
import { ResponseContext } from "./responseContext.js";

export class NucleotideAgent {
  constructor(private readonly ncbiService: NcbiService = getNcbiService()) {}

  public getAgentCard(): AgentCard {
    return {
      name: "Nucleotide",
      description:
        'Search tools for NCBI\'s Nucleotide ("nuccore") sequence database.',
      icon: null,
      entrypoints: [findSequenceRecordsEntrypoint, getSequenceRecordEntrypoint],
    };
  }

  /**
   * Validates `params` against the entrypoint's schema and runs it.
   * @throws {McpError} `CONFIGURATION_ERROR` for an entrypoint this agent
   *   does not define. Schema violations surface as a `ZodError`.
   */
  public async run(
    context: ResponseContext,
    entrypoint: string,
    params: unknown,
    requestContext: RequestContext,
  ): Promise<void> {
    switch (entrypoint) {
      case findSequenceRecordsEntrypoint.id:
        return findSequenceRecordsLogic(
          context,
          findSequenceRecordsEntrypoint.parameters.parse(params),
          requestContext,
          this.ncbiService,
        );
      case getSequenceRecordEntrypoint.id:
        return getSequenceRecordLogic(
          context,
          getSequenceRecordEntrypoint.parameters.parse(params),
          requestContext,
          this.ncbiService,
        );
      default:
        throw new McpError(
          BaseErrorCode.CONFIGURATION_ERROR,
          `Unknown entrypoint: ${entrypoint}`,
          { entrypoint },
        );
    }
  }
}
