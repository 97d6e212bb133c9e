import pino from 'pino';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { ALPACA_ENDPOINTS, createAlpacaClient } from './http';
import { BarSet, Quote, Trade } from './models';
import type { TimeFrame } from './timeframe';
import type {
  BarsPageResponse,
  DataFeed,
  LatestQuotesResponse,
  LatestTradesResponse,
  SortDirection,
  StockLatestRequest,
} from './types';

export interface StockHistoricalDataClientOptions {
  apiKey: string;
  secretKey: string;
  baseURL?: string;
  feed?: DataFeed;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export interface StockBarsRequest {
  symbolOrSymbols: string | string[];
  timeframe: TimeFrame;
  start?: Date;
  end?: Date;
  /** Total bars across all symbols and pages. */
  limit?: number;
  sort?: SortDirection;
  adjustment?: 'raw' | 'split' | 'dividend' | 'all';
  feed?: DataFeed;
}

// largest page the bars endpoint serves
const MAX_PAGE_SIZE = 10000;

const symbolsParam = (s: string | string[]): string => (Array.isArray(s) ? s.join(',') : s);

/** Stock market data endpoints (`/v2/stocks/...`). */
export class StockHistoricalDataClient {
  private readonly http: AxiosInstance;
  private readonly feed: DataFeed;

  constructor(opts: StockHistoricalDataClientOptions) {
    this.feed = opts.feed ?? 'iex';
    this.http = createAlpacaClient({
      apiKey: opts.apiKey,
      secretKey: opts.secretKey,
      baseURL: opts.baseURL ?? ALPACA_ENDPOINTS.data,
      timeoutMs: opts.timeoutMs,
      adapter: opts.adapter,
      logger: opts.logger ?? pino({ level: process.env.LOG_LEVEL ?? 'info' }),
    });
  }

  async getStockLatestQuote(req: StockLatestRequest): Promise<Record<string, Quote>> {
    const res = await this.http.get<LatestQuotesResponse>('/v2/stocks/quotes/latest', {
      params: { symbols: symbolsParam(req.symbolOrSymbols), feed: req.feed ?? this.feed },
    });
    const out: Record<string, Quote> = {};
    for (const [symbol, raw] of Object.entries(res.data.quotes ?? {})) out[symbol] = new Quote(symbol, raw);
    return out;
  }

  async getStockLatestTrade(req: StockLatestRequest): Promise<Record<string, Trade>> {
    const res = await this.http.get<LatestTradesResponse>('/v2/stocks/trades/latest', {
      params: { symbols: symbolsParam(req.symbolOrSymbols), feed: req.feed ?? this.feed },
    });
    const out: Record<string, Trade> = {};
    for (const [symbol, raw] of Object.entries(res.data.trades ?? {})) out[symbol] = new Trade(symbol, raw);
    return out;
  }

  /** Follows `next_page_token` until `limit` bars are collected or the range is exhausted. */
  async getStockBars(req: StockBarsRequest): Promise<BarSet> {
    const set = new BarSet();
    let pageToken: string | undefined;
    do {
      const remaining = req.limit === undefined ? MAX_PAGE_SIZE : Math.min(req.limit - set.size, MAX_PAGE_SIZE);
      const res = await this.http.get<BarsPageResponse>('/v2/stocks/bars', {
        params: {
          symbols: symbolsParam(req.symbolOrSymbols),
          timeframe: req.timeframe.toString(),
          start: req.start?.toISOString(),
          end: req.end?.toISOString(),
          limit: remaining,
          sort: req.sort,
          adjustment: req.adjustment,
          feed: req.feed ?? this.feed,
          page_token: pageToken,
        },
      });
      for (const [symbol, raws] of Object.entries(res.data.bars ?? {})) set.add(symbol, raws);
      pageToken = res.data.next_page_token ?? undefined;
    } while (pageToken && (req.limit === undefined || set.size < req.limit));
    return set;
  }
}
