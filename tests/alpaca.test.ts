import { describe, expect, it } from 'vitest';
import { AlpacaBrokerClient, AlpacaMarketDataClient } from '../lib/alpaca';
import type { Credentials } from '../lib/config';
import { OrderSubmissionError, TransientFetchError } from '../lib/errors';
import { fakeHttp } from './fakes';

const CREDENTIALS: Credentials = {
  alpacaKeyId: 'test-key',
  alpacaSecretKey: 'test-secret',
  tradingBaseUrl: 'https://paper.example.test',
  dataBaseUrl: 'https://data.example.test',
  dataFeed: 'iex',
  telegramBotToken: null,
  telegramChatId: null,
};

function bar(t: string, c: number) {
  return { t, o: c, h: c, l: c, c, v: 100 };
}

describe('AlpacaMarketDataClient', () => {
  it('reads the latest trade price', async () => {
    const { http, requests } = fakeHttp(() => ({ status: 200, data: { trade: { p: 101.5, s: 10, t: '2025-01-07T14:32:00Z' } } }));
    const client = new AlpacaMarketDataClient(CREDENTIALS, http);

    expect(await client.getLatestTrade('AAA')).toBe(101.5);
    expect(requests[0].url).toBe('/v2/stocks/AAA/trades/latest');
    expect(requests[0].params).toEqual({ feed: 'iex' });
  });

  it('treats a missing or non-positive trade price as unavailable', async () => {
    const { http } = fakeHttp(() => ({ status: 200, data: { trade: { p: 0, s: 1, t: '2025-01-07T14:32:00Z' } } }));
    const client = new AlpacaMarketDataClient(CREDENTIALS, http);

    expect(await client.getLatestTrade('AAA')).toBeNull();
  });

  it('maps the latest quote onto a snapshot', async () => {
    const { http } = fakeHttp(() => ({
      status: 200,
      data: { quote: { bp: 100, ap: 100.02, bs: 600, as: 100, t: '2025-01-07T14:32:00Z' } },
    }));
    const client = new AlpacaMarketDataClient(CREDENTIALS, http);

    expect(await client.getLatestQuote('AAA')).toEqual({ bid: 100, ask: 100.02, bidSize: 600, askSize: 100 });
  });

  it('wraps HTTP failures in a TransientFetchError', async () => {
    const { http } = fakeHttp(() => ({ status: 500, data: { message: 'upstream down' } }));
    const client = new AlpacaMarketDataClient(CREDENTIALS, http);

    const failure = client.getLatestTrade('AAA');
    await expect(failure).rejects.toBeInstanceOf(TransientFetchError);
    await expect(failure).rejects.toMatchObject({
      message: 'Latest trade for AAA failed: HTTP 500: upstream down',
      symbol: 'AAA',
      status: 500,
    });
  });

  it('follows page tokens and sorts each series by time', async () => {
    const pages = [
      {
        bars: { AAA: [bar('2025-01-07T14:01:00Z', 2), bar('2025-01-07T14:00:00Z', 1)] },
        next_page_token: 'page-2',
      },
      {
        bars: { AAA: [bar('2025-01-07T14:02:00Z', 3)], BBB: [bar('2025-01-07T14:00:00Z', 9)] },
        next_page_token: null,
      },
    ];
    let call = 0;
    const { http, requests } = fakeHttp(() => ({ status: 200, data: pages[call++] }));
    const client = new AlpacaMarketDataClient(CREDENTIALS, http);

    const result = await client.getBars(
      ['AAA', 'BBB', 'CCC'],
      new Date('2025-01-07T13:00:00Z'),
      new Date('2025-01-07T14:30:00Z'),
    );

    expect(result.AAA.map(b => b.close)).toEqual([1, 2, 3]);
    expect(result.BBB.map(b => b.close)).toEqual([9]);
    expect(result.CCC).toEqual([]);
    expect(requests).toHaveLength(2);
    expect(requests[0].params).toEqual({
      symbols: 'AAA,BBB,CCC',
      timeframe: '1Min',
      start: '2025-01-07T13:00:00.000Z',
      end: '2025-01-07T14:30:00.000Z',
      limit: 10_000,
      adjustment: 'raw',
      feed: 'iex',
    });
    expect(requests[1].params).toMatchObject({ page_token: 'page-2' });
  });
});

describe('AlpacaBrokerClient', () => {
  it('submits a notional market bracket order', async () => {
    const { http, requests } = fakeHttp(() => ({
      status: 200,
      data: { id: 'order-1', client_order_id: 'c-1', symbol: 'AAA', side: 'sell', filled_qty: '0', status: 'accepted' },
    }));
    const broker = new AlpacaBrokerClient(CREDENTIALS, http);

    const handle = await broker.submitBracketOrder({
      symbol: 'AAA',
      notional: 25_000,
      side: 'short',
      takeProfitPrice: 99.5,
      stopLossPrice: 100.3,
      timeInForce: 'day',
    });

    expect(handle).toEqual({ id: 'order-1', symbol: 'AAA', status: 'accepted' });
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/v2/orders');
    expect(JSON.parse(String(requests[0].data))).toEqual({
      symbol: 'AAA',
      notional: '25000.00',
      side: 'sell',
      type: 'market',
      time_in_force: 'day',
      order_class: 'bracket',
      take_profit: { limit_price: 99.5 },
      stop_loss: { stop_price: 100.3 },
    });
  });

  it('raises an OrderSubmissionError when the broker rejects the order', async () => {
    const { http } = fakeHttp(() => ({ status: 403, data: { message: 'insufficient buying power' } }));
    const broker = new AlpacaBrokerClient(CREDENTIALS, http);

    const failure = broker.submitBracketOrder({
      symbol: 'AAA',
      notional: 25_000,
      side: 'long',
      takeProfitPrice: 100.5,
      stopLossPrice: 99.7,
      timeInForce: 'day',
    });
    await expect(failure).rejects.toBeInstanceOf(OrderSubmissionError);
    await expect(failure).rejects.toMatchObject({
      symbol: 'AAA',
      status: 403,
      message: 'HTTP 403: insufficient buying power',
    });
  });

  it('lists open position symbols', async () => {
    const { http } = fakeHttp(() => ({ status: 200, data: [{ symbol: 'AAA' }, { symbol: 'BBB' }] }));
    const broker = new AlpacaBrokerClient(CREDENTIALS, http);

    expect(await broker.getOpenPositionSymbols()).toEqual(new Set(['AAA', 'BBB']));
  });

  it('maps a held position and returns null when there is none', async () => {
    const { http } = fakeHttp(config =>
      config.url === '/v2/positions/AAA'
        ? { status: 200, data: { symbol: 'AAA', qty: '-5', side: 'short', avg_entry_price: '101.25' } }
        : { status: 404, data: { message: 'position does not exist' } },
    );
    const broker = new AlpacaBrokerClient(CREDENTIALS, http);

    expect(await broker.getPosition('AAA')).toEqual({ symbol: 'AAA', qty: 5, side: 'short', avgEntryPrice: 101.25 });
    expect(await broker.getPosition('BBB')).toBeNull();
  });

  it('surfaces other position lookup failures', async () => {
    const { http } = fakeHttp(() => ({ status: 503, data: { message: 'maintenance' } }));
    const broker = new AlpacaBrokerClient(CREDENTIALS, http);

    await expect(broker.getPosition('AAA')).rejects.toBeInstanceOf(TransientFetchError);
  });

  it('closes a position at market with a DELETE', async () => {
    const { http, requests } = fakeHttp(() => ({ status: 200, data: {} }));
    const broker = new AlpacaBrokerClient(CREDENTIALS, http);

    await broker.closePositionMarket('AAA');
    expect(requests[0].method).toBe('delete');
    expect(requests[0].url).toBe('/v2/positions/AAA');
  });
});
