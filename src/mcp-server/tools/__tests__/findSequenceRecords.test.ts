import { describe, expect, it } from "vitest";
import { BaseErrorCode } from "../../../types-global/errors.js";
import { requestContextService } from "../../../utils/index.js";
import { createNcbiStub, TEST_EUTILS_BASE_URL } from "../../__tests__/ncbiStub.js";
import { CollectingResponseContext } from "../../agent/responseContext.js";
import {
  findSequenceRecordsLogic,
  NO_MATCHES_MESSAGE,
  PHRASE_NOT_FOUND_REPLY,
} from "../findSequenceRecords/logic.js";

const SEARCH_URL = `${TEST_EUTILS_BASE_URL}/esearch.fcgi?db=nuccore&term=Rattus+rattus`;

const MATCHING_RESPONSE =
  '<?xml version="1.0" encoding="UTF-8" ?>\n' +
  "<eSearchResult><Count>1234</Count><RetMax>20</RetMax><RetStart>0</RetStart>" +
  "<IdList><Id>1001</Id><Id>1002</Id></IdList></eSearchResult>";

const PHRASE_NOT_FOUND_RESPONSE =
  "<eSearchResult><Count>0</Count><RetMax>0</RetMax><RetStart>0</RetStart><IdList/>" +
  "<ErrorList><PhraseNotFound>qwxzqwxz</PhraseNotFound></ErrorList>" +
  "<WarningList><OutputMessage>No items found.</OutputMessage></WarningList>" +
  "</eSearchResult>";

async function search(body: string, status = 200, terms = "Rattus rattus") {
  const stub = createNcbiStub({ [SEARCH_URL]: { status, body } });
  const requestContext = requestContextService.createRequestContext({
    operation: "findSequenceRecordsTest",
  });
  const context = new CollectingResponseContext(requestContext);
  await findSequenceRecordsLogic(
    context,
    { search_terms: terms },
    requestContext,
    stub.service,
  );
  return { context, requestedUrls: stub.requestedUrls };
}

describe("findSequenceRecordsLogic", () => {
  it("emits one JSON artifact for a matching search", async () => {
    const { context, requestedUrls } = await search(MATCHING_RESPONSE);

    expect(requestedUrls).toEqual([SEARCH_URL]);
    expect(context.messages[0]).toEqual({
      type: "process_begin",
      summary: "Searching the NCBI Nucleotide database",
    });
    expect(context.logs).toEqual([`Sending GET request to ${SEARCH_URL}`]);
    expect(context.artifacts).toEqual([
      {
        mimetype: "application/json",
        description:
          'Nucleotide IDs for sequence records matching "Rattus rattus"',
        content:
          '{"count":1234,"page":0,"page_size":20,"sequence_ids":[],"errors":[],"warnings":[]}',
        metadata: {
          data_source: "Nucleotide database",
          api_search_terms: "Rattus rattus",
          derived_from: SEARCH_URL,
        },
      },
    ]);
    expect(context.replies).toEqual([]);
  });

  it("produces byte-identical artifacts for identical responses", async () => {
    const first = await search(MATCHING_RESPONSE);
    const second = await search(MATCHING_RESPONSE);
    expect(second.context.artifacts[0]?.content).toBe(
      first.context.artifacts[0]?.content,
    );
  });

  it("logs the status and stops on a non-success response", async () => {
    const { context } = await search("Bad Gateway", 502);
    expect(context.logs).toEqual([
      `Sending GET request to ${SEARCH_URL}`,
      "Response code: 502",
    ]);
    expect(context.artifacts).toEqual([]);
    expect(context.replies).toEqual([]);
  });

  it("emits nothing when the eSearchResult root is missing", async () => {
    const { context } = await search("<html><body>maintenance</body></html>");
    expect(context.logs).toEqual([
      `Sending GET request to ${SEARCH_URL}`,
      "Invalid response from NCBI: missing eSearchResult element",
    ]);
    expect(context.artifacts).toEqual([]);
  });

  it("emits nothing when the eSearchResult root is empty", async () => {
    const { context } = await search("<eSearchResult></eSearchResult>");
    expect(context.logs).toEqual([
      `Sending GET request to ${SEARCH_URL}`,
      "Invalid response from NCBI: missing eSearchResult element",
    ]);
    expect(context.artifacts).toEqual([]);
    expect(context.replies).toEqual([]);
  });

  it("emits nothing for malformed XML", async () => {
    const { context } = await search("<eSearchResult><Count>1</eSearchResult>");
    expect(context.logs).toHaveLength(2);
    expect(context.logs[1]).toMatch(
      /^Failed to process search results: Malformed XML: /,
    );
    expect(context.artifacts).toEqual([]);
  });

  it("reports a phrase that was not found and explains the tools", async () => {
    const { context } = await search(PHRASE_NOT_FOUND_RESPONSE);

    expect(context.logs).toEqual([
      `Sending GET request to ${SEARCH_URL}`,
      NO_MATCHES_MESSAGE,
      "NCBI reported: Phrase not found: qwxzqwxz",
      "Note: No items found.",
    ]);
    expect(context.artifacts).toHaveLength(1);
    expect(context.artifacts[0]?.content).toBe(
      '{"count":0,"page":0,"page_size":0,"sequence_ids":[],"errors":["Phrase not found: qwxzqwxz"],"warnings":["No items found."]}',
    );
    expect(context.replies).toEqual([PHRASE_NOT_FOUND_REPLY]);
    expect(PHRASE_NOT_FOUND_REPLY).toContain("find_sequence_records");
    expect(PHRASE_NOT_FOUND_REPLY).toContain("get_sequence_record");
  });

  it("still emits an artifact for zero matches without errors", async () => {
    const { context } = await search(
      "<eSearchResult><Count>0</Count><RetMax>0</RetMax><RetStart>0</RetStart></eSearchResult>",
    );
    expect(context.logs).toEqual([
      `Sending GET request to ${SEARCH_URL}`,
      NO_MATCHES_MESSAGE,
    ]);
    expect(context.artifacts).toHaveLength(1);
    expect(context.replies).toEqual([]);
  });

  it("propagates transport failures without emitting anything", async () => {
    const stub = createNcbiStub({ [SEARCH_URL]: new Error("socket hang up") });
    const requestContext = requestContextService.createRequestContext();
    const context = new CollectingResponseContext(requestContext);

    await expect(
      findSequenceRecordsLogic(
        context,
        { search_terms: "Rattus rattus" },
        requestContext,
        stub.service,
      ),
    ).rejects.toMatchObject({ code: BaseErrorCode.NCBI_SERVICE_UNAVAILABLE });
    expect(context.artifacts).toEqual([]);
    expect(context.replies).toEqual([]);
  });
});
