/**
 * @fileoverview Logic for the find_sequence_records tool: a full-text ESearch
 * against nuccore whose normalized result is emitted as a JSON artifact.
 * @module src/mcp-server/tools/findSequenceRecords/logic
 */

import { z } from "zod";
import {
  getNcbiService,
  NcbiService,
} from "../../../services/NCBI/core/ncbiService.js";
import {
  ESearchNormalizedResult,
  formatESearchError,
  parseESearchResult,
  toSearchResultsPayload,
} from "../../../services/NCBI/parsing/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
  sanitizeInputForLogging,
} from "../../../utils/index.js";
import { AgentEntrypoint } from "../../agent/agentCard.js";
import { ResponseContext } from "../../agent/responseContext.js";

export const FindSequenceRecordsInputSchema = z.object({
  search_terms: z
    .string()
    .describe(
      "Free-text search terms matched against indexed record metadata such as organism names, titles, and authors.",
    ),
});

export type FindSequenceRecordsInput = z.infer<
  typeof FindSequenceRecordsInputSchema
>;

export const findSequenceRecordsEntrypoint = {
  id: "find_sequence_records",
  title: "Find Nucleotide sequence records",
  description:
    'Use full-text search to find sequence record IDs in NCBI\'s Nucleotide ("nuccore") database. The records come from sequence databases like GenBank, RefSeq, TPA, and PDB.',
  parameters: FindSequenceRecordsInputSchema,
} satisfies AgentEntrypoint<typeof FindSequenceRecordsInputSchema>;

export const SEARCH_DATA_SOURCE = "Nucleotide database";

export const NO_MATCHES_MESSAGE =
  "No matching records found in the NCBI Nucleotide database.";

export const PHRASE_NOT_FOUND_REPLY =
  "The search failed with the error: 'Phrase not found'. This means the search terms did not match any indexed metadata fields. " +
  "The agent's capabilities are limited to: (1) find_sequence_records - searches text metadata like organism names, titles, and authors; " +
  "(2) get_sequence_record - retrieves a record by known accession number.";

/**
 * Runs one search and writes its log, artifact, and any advisory reply to
 * `context`. Non-success statuses and unparseable responses end the process
 * after a log line; nothing is thrown for them.
 * @throws {McpError} `NCBI_SERVICE_UNAVAILABLE` when NCBI cannot be reached.
 */
export async function findSequenceRecordsLogic(
  context: ResponseContext,
  input: FindSequenceRecordsInput,
  parentRequestContext: RequestContext,
  ncbiService: NcbiService = getNcbiService(),
): Promise<void> {
  const toolLogicContext = requestContextService.createRequestContext({
    parentRequestId: parentRequestContext.requestId,
    operation: "findSequenceRecordsLogic",
    input: sanitizeInputForLogging(input),
  });
  logger.info("Executing find_sequence_records tool", toolLogicContext);

  await context.beginProcess(
    "Searching the NCBI Nucleotide database",
    async (agentProcess) => {
      const searchUrl = ncbiService.eSearchUrl(input.search_terms);
      await agentProcess.log(`Sending GET request to ${searchUrl}`);
      const response = await ncbiService.get(searchUrl, toolLogicContext);

      if (!response.isSuccess) {
        logger.warning("ESearch returned a non-success status", {
          ...toolLogicContext,
          status: response.status,
        });
        await agentProcess.log(`Response code: ${response.status}`);
        return;
      }

      let results: ESearchNormalizedResult;
      try {
        results = parseESearchResult(response.body);
      } catch (error) {
        if (!(error instanceof McpError)) throw error;
        logger.warning("Could not normalize ESearch response", {
          ...toolLogicContext,
          errorCode: error.code,
          error: error.message,
        });
        if (error.code === BaseErrorCode.NCBI_PARSING_ERROR) {
          await agentProcess.log(`Failed to process search results: ${error.message}`);
          return;
        }
        if (error.code === BaseErrorCode.NCBI_MALFORMED_RESPONSE) {
          await agentProcess.log(error.message);
          return;
        }
        throw error;
      }

      if (results.count === 0) {
        await agentProcess.log(NO_MATCHES_MESSAGE);
        if (results.errors.length > 0) {
          await agentProcess.log(
            `NCBI reported: ${results.errors.map(formatESearchError).join(", ")}`,
          );
        }
        if (results.warnings.length > 0) {
          await agentProcess.log(`Note: ${results.warnings.join(", ")}`);
        }
      }

      await agentProcess.createArtifact({
        mimetype: "application/json",
        description: `Nucleotide IDs for sequence records matching "${input.search_terms}"`,
        content: JSON.stringify(toSearchResultsPayload(results)),
        metadata: {
          data_source: SEARCH_DATA_SOURCE,
          api_search_terms: input.search_terms,
          derived_from: searchUrl,
        },
      });

      if (results.errors.some((error) => error.kind === "PhraseNotFound")) {
        await context.reply(PHRASE_NOT_FOUND_REPLY);
      }

      logger.notice("Successfully executed find_sequence_records tool.", {
        ...toolLogicContext,
        count: results.count,
        errors: results.errors.length,
        warnings: results.warnings.length,
      });
    },
  );
}
