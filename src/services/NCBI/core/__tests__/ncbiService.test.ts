import { describe, expect, it } from "vitest";
import { BaseErrorCode, McpError } from "../../../../types-global/errors.js";
import { requestContextService } from "../../../../utils/index.js";
import {
  createNcbiStub,
  TEST_EUTILS_BASE_URL,
} from "../../../../mcp-server/__tests__/ncbiStub.js";
import { NcbiService } from "../ncbiService.js";

const context = requestContextService.createRequestContext({
  operation: "ncbiServiceTest",
});

describe("NcbiService URL building", () => {
  const service = new NcbiService();

  it("builds the nuccore ESearch URL with spaces turned into +", () => {
    expect(service.eSearchUrl("Rattus rattus")).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=nuccore&term=Rattus+rattus",
    );
  });

  it("passes other search syntax through unchanged", () => {
    expect(service.eSearchUrl('"cytochrome b"[Title] AND 2020[PDAT]')).toBe(
      'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi?db=nuccore&term="cytochrome+b"[Title]+AND+2020[PDAT]',
    );
  });

  it("builds EFetch URLs for both return modes", () => {
    expect(service.eFetchUrl("JQ814272", "xml")).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=nuccore&id=JQ814272&rettype=gb&retmode=xml",
    );
    expect(service.eFetchUrl("JQ814272", "text")).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=nuccore&id=JQ814272&rettype=gb&retmode=text",
    );
  });

  it("percent-encodes the record id", () => {
    expect(service.eFetchUrl("AB 12/3&x", "xml")).toBe(
      "https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi?db=nuccore&id=AB%2012%2F3%26x&rettype=gb&retmode=xml",
    );
  });

  it("uses the base URL it was given", () => {
    const { service: stubbed } = createNcbiStub({});
    expect(stubbed.buildUrl("esearch", { db: "nuccore", term: "x" })).toBe(
      `${TEST_EUTILS_BASE_URL}/esearch.fcgi?db=nuccore&term=x`,
    );
  });
});

describe("NcbiService.get", () => {
  const url = `${TEST_EUTILS_BASE_URL}/esearch.fcgi?db=nuccore&term=x`;

  it("reports a success status with the body", async () => {
    const { service, requestedUrls } = createNcbiStub({
      [url]: { status: 200, body: "<eSearchResult/>" },
    });
    await expect(service.get(url, context)).resolves.toEqual({
      url,
      status: 200,
      isSuccess: true,
      body: "<eSearchResult/>",
    });
    expect(requestedUrls).toEqual([url]);
  });

  it("reports error statuses instead of throwing", async () => {
    const { service } = createNcbiStub({
      [url]: { status: 503, body: "Service Unavailable" },
    });
    const response = await service.get(url, context);
    expect(response.status).toBe(503);
    expect(response.isSuccess).toBe(false);
    expect(response.body).toBe("Service Unavailable");
  });

  it("sends exactly one request, with no retry", async () => {
    const { service, requestedUrls } = createNcbiStub({
      [url]: { status: 500, body: "" },
    });
    await service.get(url, context);
    expect(requestedUrls).toHaveLength(1);
  });

  it("maps transport failures to NCBI_SERVICE_UNAVAILABLE", async () => {
    const { service } = createNcbiStub({
      [url]: new Error("connect ECONNREFUSED 127.0.0.1:443"),
    });
    const failure = service.get(url, context);
    await expect(failure).rejects.toBeInstanceOf(McpError);
    await expect(failure).rejects.toMatchObject({
      code: BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
      message: "NCBI request failed: connect ECONNREFUSED 127.0.0.1:443",
      details: { url },
    });
  });
});
