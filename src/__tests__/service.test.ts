import { KrakenRestConnector } from '../connectors/kraken-rest';
import { renderTicker } from '../ticker/renderer';
import { TickerService } from '../ticker/service';
import { ExchangeError, ValidationError } from '../types/api-types';
import { ethEntry, tickerBody, tickerEntry } from './fixtures/ticker';

const FIXED_NOW = new Date('2024-03-01T12:30:45Z');

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('TickerService', () => {
  let http: { get: jest.Mock };
  let service: TickerService;

  beforeEach(() => {
    http = { get: jest.fn() };
    service = new TickerService(new KrakenRestConnector(http), () => FIXED_NOW);
  });

  it('should return a stamped snapshot for the requested pair', async () => {
    http.get.mockResolvedValue({ data: tickerBody() });

    const snapshot = await service.getSnapshot('BTCUSD');

    expect(http.get).toHaveBeenCalledWith('Ticker?pair=XBTUSD');
    expect(snapshot.pair).toBe('BTCUSD');
    expect(snapshot.retrievedAt).toBe('2024-03-01T12:30:45.000Z');
    expect(snapshot.ask).toEqual({ price: '50000.1', wholeLotVolume: '1', lotVolume: '0.5' });
  });

  it('should stop at the exchange error before normalizing', async () => {
    http.get.mockResolvedValue({ data: { error: ['EQuery:Unknown asset pair'], result: {} } });

    await expect(service.getSnapshot('FOOBAR')).rejects.toEqual(
      new ExchangeError('Kraken API error: EQuery:Unknown asset pair')
    );
  });

  it('should stop when the result key is absent', async () => {
    http.get.mockResolvedValue({ data: { error: [] } });

    await expect(service.getSnapshot('ETHUSD')).rejects.toBeInstanceOf(ExchangeError);
  });

  it('should fail with a validation error on a malformed entry', async () => {
    const { a: _dropped, ...entry } = tickerEntry();
    http.get.mockResolvedValue({ data: tickerBody('XXBTZUSD', entry) });

    await expect(service.getSnapshot('BTCUSD')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should keep overlapping requests for different pairs apart', async () => {
    const btc = deferred<{ data: unknown }>();
    const eth = deferred<{ data: unknown }>();
    http.get.mockImplementation((url: string) => (url.includes('XBT') ? btc.promise : eth.promise));

    const btcRequest = service.getSnapshot('BTCUSD');
    const ethRequest = service.getSnapshot('ETHUSD');

    // answer in reverse order
    eth.resolve({ data: tickerBody('XETHZUSD', ethEntry()) });
    btc.resolve({ data: tickerBody() });

    const [btcSnapshot, ethSnapshot] = await Promise.all([btcRequest, ethRequest]);

    expect(btcSnapshot.pair).toBe('BTCUSD');
    expect(btcSnapshot.ask.price).toBe('50000.1');
    expect(ethSnapshot.pair).toBe('ETHUSD');
    expect(ethSnapshot.ask.price).toBe('3000.10');

    const ethReport = renderTicker(ethSnapshot);
    expect(ethReport).toContain('Kraken Ticker Information for ETHUSD');
    expect(ethReport).toContain('- Ask: 3000.10 (4 volume, 4.000 lot volume)');
    expect(ethReport).not.toContain('50000.1');
  });
});
