import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import { requestContextService } from "../../../utils/index.js";
import { createNcbiStub, TEST_EUTILS_BASE_URL } from "../../__tests__/ncbiStub.js";
import { NucleotideAgent } from "../nucleotideAgent.js";
import { CollectingResponseContext } from "../responseContext.js";
import { runAgentTool } from "../toolRunner.js";

const SEARCH_URL = `${TEST_EUTILS_BASE_URL}/esearch.fcgi?db=nuccore&term=Rattus+rattus`;
const SEARCH_BODY =
  "<eSearchResult><Count>3</Count><RetMax>3</RetMax><RetStart>0</RetStart></eSearchResult>";

function createAgent() {
  const stub = createNcbiStub({
    [SEARCH_URL]: { status: 200, body: SEARCH_BODY },
  });
  return { agent: new NucleotideAgent(stub.service), stub };
}

describe("NucleotideAgent", () => {
  const requestContext = requestContextService.createRequestContext({
    operation: "nucleotideAgentTest",
  });

  it("describes both entrypoints on its card", () => {
    const card = new NucleotideAgent(createNcbiStub({}).service).getAgentCard();
    expect(card.name).toBe("Nucleotide");
    expect(card.icon).toBeNull();
    expect(card.entrypoints.map((entrypoint) => entrypoint.id)).toEqual([
      "find_sequence_records",
      "get_sequence_record",
    ]);
  });

  it("dispatches to the search entrypoint", async () => {
    const { agent, stub } = createAgent();
    const context = new CollectingResponseContext(requestContext);
    await agent.run(
      context,
      "find_sequence_records",
      { search_terms: "Rattus rattus" },
      requestContext,
    );
    expect(stub.requestedUrls).toEqual([SEARCH_URL]);
    expect(context.artifacts).toHaveLength(1);
  });

  it("rejects an unknown entrypoint", async () => {
    const { agent } = createAgent();
    const context = new CollectingResponseContext(requestContext);
    const run = agent.run(context, "delete_everything", {}, requestContext);
    await expect(run).rejects.toBeInstanceOf(McpError);
    await expect(run).rejects.toMatchObject({
      code: BaseErrorCode.CONFIGURATION_ERROR,
      message: "Unknown entrypoint: delete_everything",
    });
  });

  it("rejects parameters that do not match the entrypoint schema", async () => {
    const { agent, stub } = createAgent();
    const context = new CollectingResponseContext(requestContext);
    await expect(
      agent.run(context, "get_sequence_record", { accession: 42 }, requestContext),
    ).rejects.toBeInstanceOf(ZodError);
    expect(stub.requestedUrls).toEqual([]);
  });
});

describe("runAgentTool", () => {
  const parentContext = requestContextService.createRequestContext({
    operation: "runAgentToolTest",
  });

  it("returns the transcript as a tool result", async () => {
    const { agent } = createAgent();
    const result = await runAgentTool(
      agent,
      "find_sequence_records",
      { search_terms: "Rattus rattus" },
      parentContext,
    );

    expect(result.isError).toBe(false);
    expect(result.content[0]).toEqual({
      type: "text",
      text: `# Searching the NCBI Nucleotide database\nSending GET request to ${SEARCH_URL}`,
    });
    expect(result.content[1]).toEqual({
      type: "resource",
      resource: {
        uri: SEARCH_URL,
        mimeType: "application/json",
        text: '{"count":3,"page":0,"page_size":3,"sequence_ids":[],"errors":[],"warnings":[]}',
      },
    });
  });

  it("turns an unknown entrypoint into an error result", async () => {
    const { agent } = createAgent();
    const result = await runAgentTool(agent, "nope", {}, parentContext);

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: "text",
        text: JSON.stringify({
          error: {
            code: "CONFIGURATION_ERROR",
            message: "Unknown entrypoint: nope",
            details: { entrypoint: "nope" },
          },
        }),
      },
    ]);
  });

  it("reports invalid input as a validation error", async () => {
    const { agent } = createAgent();
    const result = await runAgentTool(
      agent,
      "find_sequence_records",
      { search_terms: 5 },
      parentContext,
    );

    expect(result.isError).toBe(true);
    const [block] = result.content;
    expect(block?.type).toBe("text");
    if (block?.type === "text") {
      expect(JSON.parse(block.text)).toMatchObject({
        error: { code: "VALIDATION_ERROR" },
      });
    }
  });
});
