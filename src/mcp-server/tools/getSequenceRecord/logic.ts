/**
 * @fileoverview Logic for the get_sequence_record tool. Fetches one nuccore
 * record twice, as GenBank XML (converted to JSON and emitted inline) and as a
 * flat file (emitted as a link), and explains the two artifacts in a reply.
 * @module src/mcp-server/tools/getSequenceRecord/logic
 */

import { z } from "zod";
import { config } from "../../../config/index.js";
import {
  getNcbiService,
  NcbiService,
} from "../../../services/NCBI/core/ncbiService.js";
import {
  extractGbSeqSummary,
  GbSeqSummary,
  parseXmlDocument,
  toJsonValue,
  XmlElement,
} from "../../../services/NCBI/parsing/index.js";
import { McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
  sanitizeInputForLogging,
} from "../../../utils/index.js";
import { AgentEntrypoint } from "../../agent/agentCard.js";
import { ResponseContext } from "../../agent/responseContext.js";

export const GetSequenceRecordInputSchema = z.object({
  accession_number: z
    .string()
    .describe(
      "A sequence record ID: a GenBank accession number, GI number, Nucleotide UID, etc.",
    ),
});

export type GetSequenceRecordInput = z.infer<typeof GetSequenceRecordInputSchema>;

export const getSequenceRecordEntrypoint = {
  id: "get_sequence_record",
  title: "Get a Nucleotide sequence record",
  description:
    'Given a sequence record ID (e.g. a GenBank accession number, GI number, Nucleotide UID, etc.), downloads the associated sequence record. Retrieves a human-friendly "flat file" (.gb) record and generates a machine-friendly JSON version.',
  parameters: GetSequenceRecordInputSchema,
} satisfies AgentEntrypoint<typeof GetSequenceRecordInputSchema>;

export const RECORD_DATA_SOURCE = "Nucleotide";

export const XML_RECORD_FAILURE_REPLY = "Failed to retrieve XML record";
export const FLAT_FILE_FAILURE_REPLY = "Failed to retrieve flat file record";

export const TWO_FORMATS_REPLY =
  "The two artifacts contain the same data but in different formats. The flat file format is more" +
  " human-friendly, while the JSON format is more machine-friendly. The JSON format was converted from" +
  " the original XML returned by the API to make it easier to process.";

/**
 * Metadata shared by both artifacts of one fetch. `derived_from` is added
 * to the JSON artifact only.
 */
export type RecordMetadata = {
  data_source: typeof RECORD_DATA_SOURCE;
  link_to_view_record_on_ncbi_portal?: string;
  primary_accession?: string;
  accession_version?: string;
};

export function nucleotidePortalUrl(
  accession: string,
  portalBaseUrl: string = config.ncbiPortalBaseUrl,
): string {
  return `${portalBaseUrl}/${encodeURIComponent(accession)}`;
}

/**
 * Assembles the record metadata once from the extracted summary. Fields
 * without a value are left out entirely.
 */
export function buildRecordMetadata(
  summary: GbSeqSummary,
  portalBaseUrl: string = config.ncbiPortalBaseUrl,
): RecordMetadata {
  return {
    data_source: RECORD_DATA_SOURCE,
    ...(summary.primaryAccession
      ? {
          link_to_view_record_on_ncbi_portal: nucleotidePortalUrl(
            summary.primaryAccession,
            portalBaseUrl,
          ),
          primary_accession: summary.primaryAccession,
        }
      : {}),
    ...(summary.accessionVersion
      ? { accession_version: summary.accessionVersion }
      : {}),
  };
}

function describeRecord(
  format: string,
  accession: string,
  definition: string | undefined,
): string {
  const base = `${format} nucleotide sequence record ${accession}`;
  return definition ? `${base}: ${definition}` : base;
}

/**
 * Runs one record fetch. Each failed step logs the status and sends a
 * failure reply; the flat-file step only runs after the XML step succeeds.
 * @throws {McpError} `NCBI_SERVICE_UNAVAILABLE` when NCBI cannot be reached.
 */
export async function getSequenceRecordLogic(
  context: ResponseContext,
  input: GetSequenceRecordInput,
  parentRequestContext: RequestContext,
  ncbiService: NcbiService = getNcbiService(),
): Promise<void> {
  const toolLogicContext = requestContextService.createRequestContext({
    parentRequestId: parentRequestContext.requestId,
    operation: "getSequenceRecordLogic",
    input: sanitizeInputForLogging(input),
  });
  logger.info("Executing get_sequence_record tool", toolLogicContext);

  const accession = input.accession_number;

  await context.beginProcess(
    "Retrieving a record from the NCBI Nucleotide database",
    async (agentProcess) => {
      const xmlUrl = ncbiService.eFetchUrl(accession, "xml");
      await agentProcess.log(`Retrieving XML nucleotide record from ${xmlUrl}`);
      const xmlResponse = await ncbiService.get(xmlUrl, toolLogicContext);

      if (!xmlResponse.isSuccess) {
        logger.warning("EFetch (xml) returned a non-success status", {
          ...toolLogicContext,
          status: xmlResponse.status,
        });
        await agentProcess.log(`Response code: ${xmlResponse.status}`);
        await context.reply(XML_RECORD_FAILURE_REPLY);
        return;
      }

      await agentProcess.log("Converting XML record to JSON");
      let record: XmlElement;
      try {
        record = parseXmlDocument(xmlResponse.body);
      } catch (error) {
        if (!(error instanceof McpError)) throw error;
        logger.warning("Could not parse EFetch XML record", {
          ...toolLogicContext,
          errorCode: error.code,
          error: error.message,
        });
        await agentProcess.log(`Failed to process XML record: ${error.message}`);
        await context.reply(XML_RECORD_FAILURE_REPLY);
        return;
      }

      const summary = extractGbSeqSummary(record);
      const metadata = buildRecordMetadata(summary);
      const portalLink = metadata.link_to_view_record_on_ncbi_portal;

      if (portalLink) {
        await agentProcess.log(
          `An online version of the record is available at ${portalLink}`,
        );
      }

      await agentProcess.createArtifact({
        mimetype: "application/json",
        description: describeRecord("JSON", accession, summary.definition),
        content: JSON.stringify(toJsonValue(record)),
        metadata: { ...metadata, derived_from: xmlUrl },
      });

      const flatFileUrl = ncbiService.eFetchUrl(accession, "text");
      await agentProcess.log(
        `Retrieving flat file nucleotide record from ${flatFileUrl}`,
      );
      const flatFileResponse = await ncbiService.get(
        flatFileUrl,
        toolLogicContext,
      );

      if (!flatFileResponse.isSuccess) {
        logger.warning("EFetch (text) returned a non-success status", {
          ...toolLogicContext,
          status: flatFileResponse.status,
        });
        await agentProcess.log(`Response code: ${flatFileResponse.status}`);
        await context.reply(FLAT_FILE_FAILURE_REPLY);
        return;
      }

      await agentProcess.createArtifact({
        mimetype: "text/plain",
        description: describeRecord("Flat file", accession, summary.definition),
        uris: [flatFileUrl],
        metadata,
      });

      await context.reply(
        portalLink
          ? `${TWO_FORMATS_REPLY} The record is also available in the NCBI Nucleotide portal at ${portalLink}`
          : TWO_FORMATS_REPLY,
      );

      logger.notice("Successfully executed get_sequence_record tool.", {
        ...toolLogicContext,
        primaryAccession: summary.primaryAccession,
      });
    },
  );
}
