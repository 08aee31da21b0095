import type { KrakenRestConnector } from '../connectors/kraken-rest.js';
import type { TickerSnapshot } from '../types/market-data.js';
import { assertTickerEnvelope, normalizeTicker, stampSnapshot } from './normalizer.js';

export type Clock = () => Date;

/**
 * Runs one fetch, check and normalize pass per call. Calls share nothing but
 * the connector, so overlapping requests cannot see each other's data.
 */
export class TickerService {
  constructor(
    private readonly connector: Pick<KrakenRestConnector, 'fetchTicker'>,
    private readonly now: Clock = () => new Date()
  ) {}

  async getSnapshot(pair: string): Promise<TickerSnapshot> {
    const raw = await this.connector.fetchTicker(pair);
    const result = assertTickerEnvelope(raw);
    return stampSnapshot(normalizeTicker(pair, result), this.now());
  }
}
