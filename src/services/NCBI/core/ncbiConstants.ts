/**
 * @fileoverview Constants and shared type definitions for NCBI E-utility interactions.
 * @module src/services/NCBI/core/ncbiConstants
 */

/** The Entrez database every request in this server targets. */
export const NUCCORE_DB = "nuccore";

/** E-utilities used by the Nucleotide agent. */
export type EutilsEndpoint = "esearch" | "efetch";

/**
 * Query parameters for an E-utility request. Values are inserted into the
 * query string as given, so callers encode them first.
 */
export interface NcbiRequestParams {
  db: string;
  [key: string]: string;
}

/**
 * The outcome of one HTTP exchange with NCBI. Non-success statuses are
 * reported here rather than thrown.
 */
export interface NcbiHttpResponse {
  url: string;
  status: number;
  isSuccess: boolean;
  body: string;
}
