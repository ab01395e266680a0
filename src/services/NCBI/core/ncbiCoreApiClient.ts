/**
 * @fileoverview Core client for making HTTP requests to NCBI E-utilities.
 * Issues exactly one GET per call and reports the status instead of throwing
 * on non-2xx responses.
 * @module src/services/NCBI/core/ncbiCoreApiClient
 */

import axios, { AxiosInstance, AxiosResponse } from "axios";
import { config } from "../../../config/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import { NcbiHttpResponse } from "./ncbiConstants.js";

/**
 * Creates the axios instance used for NCBI requests. Redirects are followed
 * and every status resolves.
 */
export function createNcbiAxiosInstance(
  overrides: Parameters<typeof axios.create>[0] = {},
): AxiosInstance {
  return axios.create({
    timeout: config.ncbiRequestTimeoutMs,
    responseType: "text",
    validateStatus: () => true,
    ...overrides,
  });
}

export class NcbiCoreApiClient {
  private axiosInstance: AxiosInstance;

  constructor(axiosInstance: AxiosInstance = createNcbiAxiosInstance()) {
    this.axiosInstance = axiosInstance;
  }

  /**
   * Sends a GET request to a fully built E-utility URL.
   * @param url The URL, including its query string.
   * @param context The request context for logging.
   * @returns The status and body of the response.
   * @throws {McpError} `NCBI_SERVICE_UNAVAILABLE` when no response arrives
   *   (connection failure, timeout).
   */
  public async get(
    url: string,
    context: RequestContext,
  ): Promise<NcbiHttpResponse> {
    const requestContext = requestContextService.createRequestContext({
      ...context,
      operation: "NCBI_HttpRequest",
      url,
    });
    logger.debug(`Making NCBI HTTP request: GET ${url}`, requestContext);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.get<unknown>(url);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(
        "NCBI request failed before a response was received",
        error instanceof Error ? error : new Error(message),
        { ...requestContext, code: axios.isAxiosError(error) ? error.code : undefined },
      );
      throw new McpError(
        BaseErrorCode.NCBI_SERVICE_UNAVAILABLE,
        `NCBI request failed: ${message}`,
        { url },
      );
    }

    const body =
      typeof response.data === "string"
        ? response.data
        : response.data === undefined || response.data === null
          ? ""
          : JSON.stringify(response.data);
    const isSuccess = response.status >= 200 && response.status < 300;

    logger.debug("Received NCBI response.", {
      ...requestContext,
      status: response.status,
      bodyLength: body.length,
    });

    return { url, status: response.status, isSuccess, body };
  }
}
