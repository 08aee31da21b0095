import { z } from 'zod';

/**
 * Raw ticker payload of `GET /0/public/Ticker`.
 *
 * a = ask array(<price>, <whole lot volume>, <lot volume>)
 * b = bid array(<price>, <whole lot volume>, <lot volume>)
 * c = last trade closed array(<price>, <lot volume>)
 * v = volume array(<today>, <last 24 hours>)
 * p = volume weighted average price array(<today>, <last 24 hours>)
 * t = number of trades array(<today>, <last 24 hours>)
 * l = low array(<today>, <last 24 hours>)
 * h = high array(<today>, <last 24 hours>)
 * o = today's opening price
 */

// Kraken quotes decimals as strings; trade counts arrive as integers.
// Both are kept as text so no precision is lost.
const Value = z.union([z.string(), z.number().int()]).transform(String);

const Slots = (n: number) => z.array(Value).min(n);

export const KrakenRawTickerSchema = z.object({
  a: Slots(3),
  b: Slots(3),
  c: Slots(2),
  v: Slots(2),
  p: Slots(2),
  t: Slots(2),
  l: Slots(2),
  h: Slots(2),
  o: Value,
});

/** Top-level body of every Kraken public endpoint. */
export const KrakenEnvelopeSchema = z.object({
  error: z.array(z.string()).optional(),
  result: z.record(z.unknown()).optional(),
});
