import axios, { AxiosInstance } from 'axios';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { TransportError } from '../types/api-types.js';

/** The one axios method the connector calls; tests pass a stub with just `get`. */
export type KrakenHttpClient = Pick<AxiosInstance, 'get'>;

/**
 * Creates the process-wide client bound to Kraken's public REST base URL.
 * No timeout or retry is configured on top of axios' defaults.
 */
export function createKrakenHttpClient(): AxiosInstance {
  return axios.create({
    baseURL: config.REST_URL,
    headers: {
      Accept: 'application/json'
    }
  });
}

/**
 * Kraken lists bitcoin under its legacy ISO code, XBT.
 * Only the outbound query is rewritten; the caller keeps its own spelling.
 */
export function toKrakenPair(pair: string): string {
  return pair.replace(/BTC/g, 'XBT');
}

/**
 * KrakenRestConnector
 *  - fetchTicker(...) => GET /0/public/Ticker?pair=...
 */
export class KrakenRestConnector {
  constructor(private readonly http: KrakenHttpClient) {}

  /**
   * Returns the decoded JSON body untouched. HTTP and network failures become
   * TransportError; anything else propagates as is.
   */
  async fetchTicker(pair: string): Promise<unknown> {
    const krakenPair = toKrakenPair(pair);
    logger.debug({ pair, krakenPair }, 'Fetching Kraken ticker');

    try {
      const response = await this.http.get<unknown>(`Ticker?pair=${encodeURIComponent(krakenPair)}`);
      return response.data;
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }

      if (error.response) {
        const { status, statusText } = error.response;
        logger.error({ pair, status }, 'Kraken ticker request rejected');
        throw new TransportError(
          `Error fetching Kraken ticker info: HTTP ${status}${statusText ? ` ${statusText}` : ''}`,
          status,
          error
        );
      }

      logger.error({ pair, code: error.code }, 'Kraken ticker request failed');
      throw new TransportError(
        `Error fetching Kraken ticker info: ${error.code ? `${error.code} ` : ''}${error.message}`,
        undefined,
        error
      );
    }
  }
}
