/**
 * @fileoverview Service for interacting with NCBI E-utilities on behalf of the
 * Nucleotide agent: builds ESearch/EFetch URLs for the `nuccore` database and
 * performs single, unretried GET requests.
 * @module src/services/NCBI/core/ncbiService
 */

import { config } from "../../../config/index.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import {
  EutilsEndpoint,
  NcbiHttpResponse,
  NcbiRequestParams,
  NUCCORE_DB,
} from "./ncbiConstants.js";
import { NcbiCoreApiClient } from "./ncbiCoreApiClient.js";

/** Return modes accepted by the nuccore EFetch endpoint for GenBank records. */
export type NucleotideRetmode = "xml" | "text";

export class NcbiService {
  private apiClient: NcbiCoreApiClient;
  private readonly eutilsBaseUrl: string;

  constructor(
    apiClient: NcbiCoreApiClient = new NcbiCoreApiClient(),
    eutilsBaseUrl: string = config.ncbiEutilsBaseUrl,
  ) {
    this.apiClient = apiClient;
    this.eutilsBaseUrl = eutilsBaseUrl;
  }

  /**
   * Builds `<base>/<endpoint>.fcgi?k=v&...` in insertion order, without
   * further encoding of the values.
   */
  public buildUrl(endpoint: EutilsEndpoint, params: NcbiRequestParams): string {
    const query = Object.entries(params)
      .map(([key, value]) => `${key}=${value}`)
      .join("&");
    return `${this.eutilsBaseUrl}/${endpoint}.fcgi?${query}`;
  }

  /**
   * ESearch URL for a nuccore full-text query. Spaces become `+`; nothing
   * else in the term is encoded.
   */
  public eSearchUrl(searchTerms: string): string {
    return this.buildUrl("esearch", {
      db: NUCCORE_DB,
      term: searchTerms.replace(/ /g, "+"),
    });
  }

  /**
   * EFetch URL for one GenBank record in the given return mode.
   */
  public eFetchUrl(id: string, retmode: NucleotideRetmode): string {
    return this.buildUrl("efetch", {
      db: NUCCORE_DB,
      id: encodeURIComponent(id),
      rettype: "gb",
      retmode,
    });
  }

  public async get(
    url: string,
    context: RequestContext,
  ): Promise<NcbiHttpResponse> {
    return this.apiClient.get(url, context);
  }
}

let ncbiServiceInstance: NcbiService | undefined;

export function getNcbiService(): NcbiService {
  if (!ncbiServiceInstance) {
    ncbiServiceInstance = new NcbiService();
    logger.debug(
      "NcbiService lazily initialized.",
      requestContextService.createRequestContext({
        service: "NcbiService",
        operation: "getNcbiServiceInstance",
      }),
    );
  }
  return ncbiServiceInstance;
}
