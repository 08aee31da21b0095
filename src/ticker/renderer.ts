import type { CallToolResult, GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import type { TickerSnapshot } from '../types/market-data.js';

const UNKNOWN_TIME = 'Unknown time';

/** ISO-8601 UTC in, `YYYY-MM-DD HH:MM:SS UTC` out */
export function formatRetrievedAt(iso?: string): string {
  if (!iso) return UNKNOWN_TIME;
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

export function renderTicker(snapshot: TickerSnapshot): string {
  const { pair, ask, bid, lastTrade, volume, vwap, tradeCount, low, high } = snapshot;

  return [
    `Kraken Ticker Information for ${pair}`,
    '',
    `Data retrieved from ${snapshot.source} at ${formatRetrievedAt(snapshot.retrievedAt)}`,
    '',
    'Current Prices:',
    `- Ask: ${ask.price} (${ask.wholeLotVolume} volume, ${ask.lotVolume} lot volume)`,
    `- Bid: ${bid.price} (${bid.wholeLotVolume} volume, ${bid.lotVolume} lot volume)`,
    `- Last Trade: ${lastTrade.price} (${lastTrade.volume} volume)`,
    '',
    'Volume Statistics:',
    `- Volume Today: ${volume.today}`,
    `- Volume Last 24h: ${volume.last24h}`,
    `- Volume Weighted Avg Price Today: ${vwap.today}`,
    `- Volume Weighted Avg Price Last 24h: ${vwap.last24h}`,
    '',
    'Trading Activity:',
    `- Number of Trades Today: ${tradeCount.today}`,
    `- Number of Trades Last 24h: ${tradeCount.last24h}`,
    '',
    'Price Range:',
    `- Low Today: ${low.today}`,
    `- Low Last 24h: ${low.last24h}`,
    `- High Today: ${high.today}`,
    `- High Last 24h: ${high.last24h}`,
    `- Opening Price: ${snapshot.openingPrice}`,
    '',
    'This data represents a snapshot of market conditions at the time of retrieval and may have changed since then.',
  ].join('\n');
}

export function toToolResult(snapshot: TickerSnapshot): CallToolResult {
  return {
    content: [{ type: 'text', text: renderTicker(snapshot) }],
  };
}

export function toPromptResult(snapshot: TickerSnapshot): GetPromptResult {
  return {
    description: `Kraken Ticker Information for ${snapshot.pair}`,
    messages: [
      {
        role: 'user',
        content: { type: 'text', text: renderTicker(snapshot) },
      },
    ],
  };
}
