// market-data.ts
// Every price and volume is the exchange's own decimal text, never a parsed float.

export interface OrderSide {
  readonly price: string;
  readonly wholeLotVolume: string;
  readonly lotVolume: string;
}

export interface LastTrade {
  readonly price: string;
  readonly volume: string;
}

export interface DailyWindow {
  readonly today: string;
  readonly last24h: string;
}

export interface TickerSnapshot {
  readonly pair: string;              // as requested, not Kraken's internal key
  readonly ask: OrderSide;
  readonly bid: OrderSide;
  readonly lastTrade: LastTrade;
  readonly volume: DailyWindow;
  readonly vwap: DailyWindow;
  readonly tradeCount: DailyWindow;
  readonly low: DailyWindow;
  readonly high: DailyWindow;
  readonly openingPrice: string;
  readonly retrievedAt?: string;      // ISO-8601 UTC, set once after a successful parse
  readonly source: string;
}
