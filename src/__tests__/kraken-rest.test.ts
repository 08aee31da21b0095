import { AxiosError, AxiosHeaders } from 'axios';
import { KrakenRestConnector, createKrakenHttpClient, toKrakenPair } from '../connectors/kraken-rest';
import { TransportError } from '../types/api-types';
import { tickerBody } from './fixtures/ticker';

describe('toKrakenPair', () => {
  it('should rewrite BTC to XBT', () => {
    expect(toKrakenPair('BTCUSD')).toBe('XBTUSD');
    expect(toKrakenPair('BTCBTC')).toBe('XBTXBT');
  });

  it('should leave other symbols alone', () => {
    expect(toKrakenPair('ETHUSD')).toBe('ETHUSD');
    expect(toKrakenPair('XBTUSD')).toBe('XBTUSD');
  });
});

describe('createKrakenHttpClient', () => {
  it('should bind to the public REST base URL without a timeout override', () => {
    const client = createKrakenHttpClient();
    expect(client.defaults.baseURL).toBe('https://api.kraken.com/0/public/');
    expect(client.defaults.timeout).toBe(0);
  });
});

describe('KrakenRestConnector', () => {
  let http: { get: jest.Mock };
  let connector: KrakenRestConnector;

  beforeEach(() => {
    http = { get: jest.fn() };
    connector = new KrakenRestConnector(http);
  });

  it('should query the rewritten pair and returns the body untouched', async () => {
    const body = tickerBody();
    http.get.mockResolvedValue({ data: body, status: 200 });

    await expect(connector.fetchTicker('BTCUSD')).resolves.toBe(body);
    expect(http.get).toHaveBeenCalledTimes(1);
    expect(http.get).toHaveBeenCalledWith('Ticker?pair=XBTUSD');
  });

  it('should report a non-2xx status as a transport error', async () => {
    const response = {
      data: {},
      status: 503,
      statusText: 'Service Unavailable',
      headers: {},
      config: { headers: new AxiosHeaders() }
    };
    http.get.mockRejectedValue(
      new AxiosError('Request failed with status code 503', AxiosError.ERR_BAD_RESPONSE, undefined, undefined, response)
    );

    const failure = connector.fetchTicker('ETHUSD');
    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      message: 'Error fetching Kraken ticker info: HTTP 503 Service Unavailable',
      status: 503
    });
  });

  it('should report a network failure as a transport error', async () => {
    http.get.mockRejectedValue(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'));

    await expect(connector.fetchTicker('ETHUSD')).rejects.toMatchObject({
      kind: 'transport',
      message: 'Error fetching Kraken ticker info: ECONNREFUSED connect ECONNREFUSED 127.0.0.1:443',
      status: undefined
    });
  });

  it('should let unexpected exceptions through unchanged', async () => {
    const bug = new TypeError('boom');
    http.get.mockRejectedValue(bug);

    await expect(connector.fetchTicker('ETHUSD')).rejects.toBe(bug);
  });
});
