import type { ZodIssue, ZodType } from 'zod';
import { config } from '../config.js';
import { ExchangeError, ValidationError, isRecord } from '../types/api-types.js';
import { KrakenEnvelopeSchema, KrakenRawTickerSchema } from '../types/kraken-raw.js';
import type { DailyWindow, TickerSnapshot } from '../types/market-data.js';

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === 'number' ? `${acc}[${segment}]` : acc ? `${acc}.${segment}` : segment),
    ''
  );
}

function describeIssue(issue: ZodIssue): string {
  switch (issue.code) {
    case 'invalid_type':
      return issue.received === 'undefined'
        ? 'is missing'
        : `must be ${issue.expected}, got ${issue.received}`;
    case 'too_small':
      return `has fewer than ${issue.minimum} entries`;
    default:
      return `is malformed (${issue.message})`;
  }
}

function parseEnvelopePart<T>(schema: ZodType<T>, raw: Record<string, unknown>): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ExchangeError(
      `Invalid response from Kraken API: '${formatPath(issue.path)}' ${describeIssue(issue)}`
    );
  }
  return parsed.data;
}

/**
 * Checks Kraken's top-level `{ error, result }` body and returns the `result` map.
 * An exchange-side error or a missing `result` never reaches field projection.
 */
export function assertTickerEnvelope(raw: unknown): Record<string, unknown> {
  if (!isRecord(raw)) {
    throw new ExchangeError(config.ERRORS.NOT_AN_OBJECT);
  }

  // error before result: the exchange message wins over a malformed result
  const { error } = parseEnvelopePart(KrakenEnvelopeSchema.pick({ error: true }), raw);
  if (error && error.length > 0) {
    throw new ExchangeError(`Kraken API error: ${error[0]}`);
  }
  if (raw.result === undefined) {
    throw new ExchangeError(config.ERRORS.MISSING_RESULT);
  }

  const { result } = parseEnvelopePart(KrakenEnvelopeSchema.pick({ result: true }), raw);
  return result ?? {};
}

function dailyWindow([today, last24h]: string[]): DailyWindow {
  return Object.freeze({ today, last24h });
}

/**
 * Projects the first entry of a Kraken ticker `result` map onto a TickerSnapshot.
 *
 * Kraken keys the entry by its own pair code (XXBTZUSD for BTCUSD), so the key
 * is ignored and the requested pair is kept instead. Either every field maps
 * or a ValidationError names the first one that does not.
 */
export function normalizeTicker(pair: string, result: Record<string, unknown>): TickerSnapshot {
  const [entry] = Object.values(result);
  if (entry === undefined) {
    throw new ExchangeError(config.ERRORS.EMPTY_RESULT);
  }

  const parsed = KrakenRawTickerSchema.safeParse(entry);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ValidationError(formatPath(issue.path) || '<entry>', describeIssue(issue));
  }

  const { a, b, c, v, p, t, l, h, o } = parsed.data;
  return Object.freeze({
    pair,
    ask: Object.freeze({ price: a[0], wholeLotVolume: a[1], lotVolume: a[2] }),
    bid: Object.freeze({ price: b[0], wholeLotVolume: b[1], lotVolume: b[2] }),
    lastTrade: Object.freeze({ price: c[0], volume: c[1] }),
    volume: dailyWindow(v),
    vwap: dailyWindow(p),
    tradeCount: dailyWindow(t),
    low: dailyWindow(l),
    high: dailyWindow(h),
    openingPrice: o,
    source: config.SOURCE,
  });
}

/**
 * Returns a frozen copy carrying the retrieval time. The time is kept as ISO
 * text so the caller's Date can change afterwards without reaching the snapshot.
 */
export function stampSnapshot(snapshot: TickerSnapshot, retrievedAt: Date): TickerSnapshot {
  return Object.freeze({ ...snapshot, retrievedAt: retrievedAt.toISOString() });
}
