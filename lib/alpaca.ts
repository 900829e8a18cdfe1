import axios, { type AxiosInstance } from 'axios';
import type {
  BarsBySymbol,
  BracketOrderRequest,
  BrokerClient,
  BrokerPosition,
  MarketDataClient,
  MinuteBar,
  OrderHandle,
  QuoteSnapshot,
} from '../types';
import type { Credentials } from './config';
import { OrderSubmissionError, TransientFetchError } from './errors';

const REQUEST_TIMEOUT_MS = 10_000;
const BARS_PAGE_LIMIT = 10_000;

export interface AlpacaBar {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  vw?: number;
  n?: number;
}

export interface AlpacaQuote {
  ap: number;
  as: number;
  bp: number;
  bs: number;
  t: string;
}

export interface AlpacaTrade {
  p: number;
  s: number;
  t: string;
}

export interface AlpacaOrder {
  id: string;
  client_order_id: string;
  symbol: string;
  side: 'buy' | 'sell';
  order_class?: string;
  notional?: string | null;
  qty?: string | null;
  filled_qty: string;
  filled_avg_price?: string | null;
  status: string;
}

export interface AlpacaPosition {
  symbol: string;
  qty: string;
  side: 'long' | 'short';
  avg_entry_price: string;
  market_value: string;
  unrealized_pl: string;
  current_price: string;
}

interface MultiBarsResponse {
  bars?: Record<string, AlpacaBar[] | null> | null;
  next_page_token?: string | null;
}

function createAlpacaHttp(baseURL: string, credentials: Credentials): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: REQUEST_TIMEOUT_MS,
    headers: {
      'APCA-API-KEY-ID': credentials.alpacaKeyId,
      'APCA-API-SECRET-KEY': credentials.alpacaSecretKey,
      'Content-Type': 'application/json',
    },
  });
}

function statusOf(err: unknown): number | undefined {
  return axios.isAxiosError(err) ? err.response?.status : undefined;
}

function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const body = err.response?.data;
    const detail = typeof body === 'object' && body !== null && 'message' in body ? String(body.message) : err.message;
    return err.response ? `HTTP ${err.response.status}: ${detail}` : detail;
  }
  return err instanceof Error ? err.message : String(err);
}

function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

export function toMinuteBar(bar: AlpacaBar): MinuteBar {
  return {
    timestamp: bar.t,
    open: bar.o,
    high: bar.h,
    low: bar.l,
    close: bar.c,
    volume: bar.v,
  };
}

/**
 * Market data over the Alpaca v2 stocks REST API.
 */
export class AlpacaMarketDataClient implements MarketDataClient {
  private readonly http: AxiosInstance;
  private readonly feed: string;

  constructor(credentials: Credentials, http?: AxiosInstance) {
    this.http = http ?? createAlpacaHttp(credentials.dataBaseUrl, credentials);
    this.feed = credentials.dataFeed;
  }

  async getLatestTrade(symbol: string): Promise<number | null> {
    try {
      const response = await this.http.get<{ trade?: AlpacaTrade | null }>(
        `/v2/stocks/${encodeURIComponent(symbol)}/trades/latest`,
        { params: { feed: this.feed } },
      );
      const price = response.data.trade?.p;
      return typeof price === 'number' && Number.isFinite(price) && price > 0 ? price : null;
    } catch (err) {
      throw new TransientFetchError(`Latest trade for ${symbol} failed: ${describeHttpError(err)}`, {
        symbol,
        status: statusOf(err),
        cause: err,
      });
    }
  }

  async getLatestQuote(symbol: string): Promise<QuoteSnapshot | null> {
    try {
      const response = await this.http.get<{ quote?: AlpacaQuote | null }>(
        `/v2/stocks/${encodeURIComponent(symbol)}/quotes/latest`,
        { params: { feed: this.feed } },
      );
      const quote = response.data.quote;
      if (!quote) {
        return null;
      }
      return { bid: quote.bp, ask: quote.ap, bidSize: quote.bs, askSize: quote.as };
    } catch (err) {
      throw new TransientFetchError(`Latest quote for ${symbol} failed: ${describeHttpError(err)}`, {
        symbol,
        status: statusOf(err),
        cause: err,
      });
    }
  }

  async getBars(symbols: string[], start: Date, end: Date): Promise<BarsBySymbol> {
    const result: BarsBySymbol = {};
    for (const symbol of symbols) {
      result[symbol] = [];
    }
    if (symbols.length === 0) {
      return result;
    }

    let pageToken: string | null = null;
    do {
      let data: MultiBarsResponse;
      try {
        const response = await this.http.get<MultiBarsResponse>('/v2/stocks/bars', {
          params: {
            symbols: symbols.join(','),
            timeframe: '1Min',
            start: start.toISOString(),
            end: end.toISOString(),
            limit: BARS_PAGE_LIMIT,
            adjustment: 'raw',
            feed: this.feed,
            ...(pageToken ? { page_token: pageToken } : {}),
          },
        });
        data = response.data;
      } catch (err) {
        throw new TransientFetchError(`Bars for ${symbols.join(',')} failed: ${describeHttpError(err)}`, {
          status: statusOf(err),
          cause: err,
        });
      }

      for (const [symbol, bars] of Object.entries(data.bars ?? {})) {
        if (!bars) continue;
        const series = result[symbol] ?? (result[symbol] = []);
        series.push(...bars.map(toMinuteBar));
      }
      pageToken = data.next_page_token ?? null;
    } while (pageToken);

    for (const series of Object.values(result)) {
      series.sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());
    }
    return result;
  }
}

/**
 * Order and position management over the Alpaca v2 trading REST API.
 */
export class AlpacaBrokerClient implements BrokerClient {
  private readonly http: AxiosInstance;

  constructor(credentials: Credentials, http?: AxiosInstance) {
    this.http = http ?? createAlpacaHttp(credentials.tradingBaseUrl, credentials);
  }

  async submitBracketOrder(request: BracketOrderRequest): Promise<OrderHandle> {
    const body = {
      symbol: request.symbol,
      notional: request.notional.toFixed(2),
      side: request.side === 'long' ? 'buy' : 'sell',
      type: 'market',
      time_in_force: request.timeInForce,
      order_class: 'bracket',
      take_profit: { limit_price: roundPrice(request.takeProfitPrice) },
      stop_loss: { stop_price: roundPrice(request.stopLossPrice) },
    };

    try {
      const response = await this.http.post<AlpacaOrder>('/v2/orders', body);
      return { id: response.data.id, symbol: response.data.symbol, status: response.data.status };
    } catch (err) {
      throw new OrderSubmissionError(request.symbol, describeHttpError(err), { status: statusOf(err), cause: err });
    }
  }

  async getOpenPositionSymbols(): Promise<Set<string>> {
    try {
      const response = await this.http.get<AlpacaPosition[]>('/v2/positions');
      return new Set(response.data.map(position => position.symbol));
    } catch (err) {
      throw new TransientFetchError(`Listing positions failed: ${describeHttpError(err)}`, {
        status: statusOf(err),
        cause: err,
      });
    }
  }

  async getPosition(symbol: string): Promise<BrokerPosition | null> {
    try {
      const response = await this.http.get<AlpacaPosition>(`/v2/positions/${encodeURIComponent(symbol)}`);
      const position = response.data;
      return {
        symbol: position.symbol,
        qty: Math.abs(Number(position.qty)),
        side: position.side,
        avgEntryPrice: Number(position.avg_entry_price),
      };
    } catch (err) {
      if (statusOf(err) === 404) {
        return null;
      }
      throw new TransientFetchError(`Position ${symbol} failed: ${describeHttpError(err)}`, {
        symbol,
        status: statusOf(err),
        cause: err,
      });
    }
  }

  async closePositionMarket(symbol: string): Promise<void> {
    try {
      await this.http.delete(`/v2/positions/${encodeURIComponent(symbol)}`);
    } catch (err) {
      throw new OrderSubmissionError(symbol, `Close failed: ${describeHttpError(err)}`, {
        status: statusOf(err),
        cause: err,
      });
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
