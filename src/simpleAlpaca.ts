import pino from 'pino';
import type { AxiosAdapter } from 'axios';
import type { Logger } from 'pino';
import { loadConfig } from './config';
import { ValidationError } from './errors';
import { StockHistoricalDataClient } from './exchanges/alpaca/historicalClient';
import type { Bar } from './exchanges/alpaca/models';
import { StockDataStream } from './exchanges/alpaca/stream';
import { TimeFrameUnit } from './exchanges/alpaca/timeframe';
import type { TimeFrame } from './exchanges/alpaca/timeframe';
import { TradingClient } from './exchanges/alpaca/tradingClient';
import type {
  AssetClass,
  AssetStatus,
  DataFeed,
  OrderRequest,
  QueryOrderStatus,
  TimeInForce,
} from './exchanges/alpaca/types';
import { toJsonObject } from './normalize';
import type { JsonObject, JsonValue } from './normalize';
import { coerceSide, coerceTimeInForce, parseDateInput } from './orders';
import { parseTimeFrame } from './timeframe';

export interface SimpleAlpacaOptions {
  apiKey: string;
  secretKey: string;
  /** Paper account unless explicitly false. */
  paper?: boolean;
  feed?: DataFeed;
  tradingBaseURL?: string;
  dataBaseURL?: string;
  streamURL?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export type TimeFrameInput = string | number | TimeFrame;
export type PriceCallback = (bar: JsonObject) => void | Promise<void>;

export interface TrailingStopOptions {
  trailPercent?: number;
  trailPrice?: number;
  side?: string;
  tif?: TimeInForce | string;
}

export interface PortfolioSummary {
  cash: JsonValue;
  buying_power: JsonValue;
  portfolio_value: JsonValue;
  positions: JsonObject[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

// how far back getLastBar looks for the most recent bar of a unit
const LAST_BAR_LOOKBACK_DAYS: Record<TimeFrameUnit, number> = {
  [TimeFrameUnit.Minute]: 7,
  [TimeFrameUnit.Hour]: 7,
  [TimeFrameUnit.Day]: 365,
  [TimeFrameUnit.Week]: 365,
  [TimeFrameUnit.Month]: 5 * 365,
};

const toJsonList = (items: readonly unknown[]): JsonObject[] => items.map((item) => toJsonObject(item));

/**
 * Convenience façade over the trading and market data clients.
 *
 * Every method returns JSON-friendly objects. The typed clients stay
 * reachable through `trading` and `marketData` for callers who want the raw
 * responses.
 */
export class SimpleAlpaca {
  readonly trading: TradingClient;
  readonly marketData: StockHistoricalDataClient;
  private readonly logger: Logger;
  private readonly apiKey: string;
  private readonly secretKey: string;
  private readonly feed: DataFeed;
  private readonly streamURL?: string;
  private stream: StockDataStream | null = null;

  constructor(opts: SimpleAlpacaOptions) {
    this.logger = opts.logger ?? pino({ level: process.env.LOG_LEVEL ?? 'info' });
    this.apiKey = opts.apiKey;
    this.secretKey = opts.secretKey;
    this.feed = opts.feed ?? 'iex';
    this.streamURL = opts.streamURL;
    this.trading = new TradingClient({
      apiKey: opts.apiKey,
      secretKey: opts.secretKey,
      paper: opts.paper ?? true,
      baseURL: opts.tradingBaseURL,
      timeoutMs: opts.timeoutMs,
      adapter: opts.adapter,
      logger: this.logger,
    });
    this.marketData = new StockHistoricalDataClient({
      apiKey: opts.apiKey,
      secretKey: opts.secretKey,
      baseURL: opts.dataBaseURL,
      feed: this.feed,
      timeoutMs: opts.timeoutMs,
      adapter: opts.adapter,
      logger: this.logger,
    });
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, logger?: Logger): SimpleAlpaca {
    const cfg = loadConfig(env);
    return new SimpleAlpaca({
      apiKey: cfg.ALPACA_API_KEY_ID,
      secretKey: cfg.ALPACA_API_SECRET_KEY,
      paper: cfg.paper,
      feed: cfg.ALPACA_DATA_FEED,
      tradingBaseURL: cfg.paper ? cfg.ALPACA_PAPER_BASE_URL : cfg.ALPACA_LIVE_BASE_URL,
      dataBaseURL: cfg.ALPACA_DATA_BASE_URL,
      streamURL: cfg.ALPACA_STREAM_BASE_URL,
      timeoutMs: cfg.HTTP_TIMEOUT_MS,
      logger: logger ?? pino({ level: cfg.LOG_LEVEL }),
    });
  }

  // account / positions

  async getAccountJson(): Promise<JsonObject> {
    return toJsonObject(await this.trading.getAccount());
  }

  async getPositions(): Promise<JsonObject[]> {
    return toJsonList(await this.trading.getAllPositions());
  }

  async getPosition(symbol: string): Promise<JsonObject> {
    return toJsonObject(await this.trading.getPosition(symbol));
  }

  async portfolioSummary(): Promise<PortfolioSummary> {
    const [account, positions] = await Promise.all([this.getAccountJson(), this.getPositions()]);
    return {
      cash: account.cash,
      buying_power: account.buying_power,
      portfolio_value: account.portfolio_value,
      positions,
    };
  }

  async cash(): Promise<number> {
    const account = await this.trading.getAccount();
    return parseFloat(account.cash);
  }

  async buyingPower(): Promise<number> {
    const account = await this.trading.getAccount();
    return parseFloat(account.buying_power);
  }

  async describe(): Promise<string> {
    const account = await this.trading.getAccount();
    return `<SimpleAlpaca cash=$${account.cash} portfolio=$${account.portfolio_value}>`;
  }

  // orders

  private async submit(order: OrderRequest): Promise<JsonObject> {
    this.logger.info(
      { symbol: order.symbol, side: order.side, type: order.type, qty: order.qty, notional: order.notional },
      'submitting order',
    );
    return toJsonObject(await this.trading.submitOrder(order));
  }

  async marketBuy(symbol: string, qty: number, tif: TimeInForce | string = 'day'): Promise<JsonObject> {
    return this.submit({ symbol, qty, side: 'buy', type: 'market', timeInForce: coerceTimeInForce(tif) });
  }

  async marketSell(symbol: string, qty: number, tif: TimeInForce | string = 'day'): Promise<JsonObject> {
    return this.submit({ symbol, qty, side: 'sell', type: 'market', timeInForce: coerceTimeInForce(tif) });
  }

  async limitOrder(
    symbol: string,
    qty: number,
    limitPrice: number,
    side = 'buy',
    tif: TimeInForce | string = 'day',
  ): Promise<JsonObject> {
    return this.submit({
      symbol,
      qty,
      side: coerceSide(side),
      type: 'limit',
      limitPrice,
      timeInForce: coerceTimeInForce(tif),
    });
  }

  async stopLoss(
    symbol: string,
    qty: number,
    stopPrice: number,
    side = 'sell',
    tif: TimeInForce | string = 'gtc',
  ): Promise<JsonObject> {
    return this.submit({
      symbol,
      qty,
      side: coerceSide(side),
      type: 'stop',
      stopPrice,
      timeInForce: coerceTimeInForce(tif),
    });
  }

  async trailingStop(symbol: string, qty: number, opts: TrailingStopOptions = {}): Promise<JsonObject> {
    const { trailPercent, trailPrice, side = 'sell', tif = 'gtc' } = opts;
    // zero counts as unset
    if (!trailPercent && !trailPrice) {
      throw new ValidationError('Specify trailPercent or trailPrice.', 'trailPercent');
    }
    return this.submit({
      symbol,
      qty,
      side: coerceSide(side),
      type: 'trailing_stop',
      trailPercent: trailPercent || undefined,
      trailPrice: trailPrice || undefined,
      timeInForce: coerceTimeInForce(tif),
    });
  }

  /**
   * Submits any order the orders endpoint accepts, e.g.
   * `{ symbol: 'MSFT', qty: 0.5, side: 'sell', type: 'stop_limit', limitPrice: 320, stopPrice: 321, timeInForce: 'day' }`.
   */
  async submitCustomOrder(order: OrderRequest): Promise<JsonObject> {
    return this.submit(order);
  }

  async cancelOrder(orderId: string): Promise<void> {
    await this.trading.cancelOrderById(orderId);
  }

  /** Cancels every open order. */
  async cancelAllOrders(): Promise<JsonObject[]> {
    return toJsonList(await this.trading.cancelOrders());
  }

  async listOrders(status: QueryOrderStatus = 'all', limit = 50): Promise<JsonObject[]> {
    return toJsonList(await this.trading.getOrders({ status, limit }));
  }

  async getOrder(orderId: string): Promise<JsonObject> {
    return toJsonObject(await this.trading.getOrderById(orderId));
  }

  // closing positions

  async closePosition(symbol: string): Promise<JsonObject> {
    return toJsonObject(await this.trading.closePosition(symbol));
  }

  /** Liquidates every open position at market. */
  async closeAllPositions(cancelOrders = false): Promise<JsonObject[]> {
    return toJsonList(await this.trading.closeAllPositions(cancelOrders));
  }

  // assets / clock

  async listAssets(status: AssetStatus = 'active', assetClass: AssetClass = 'us_equity'): Promise<JsonObject[]> {
    return toJsonList(await this.trading.getAllAssets({ status, assetClass }));
  }

  async getClock(): Promise<JsonObject> {
    return toJsonObject(await this.trading.getClock());
  }

  async isMarketOpen(): Promise<boolean> {
    const clock = await this.trading.getClock();
    return clock.is_open;
  }

  // market data

  async getLastQuote(symbol: string): Promise<JsonObject | null> {
    const quotes = await this.marketData.getStockLatestQuote({ symbolOrSymbols: symbol });
    const quote = quotes[symbol] ?? Object.values(quotes)[0];
    return quote ? toJsonObject(quote) : null;
  }

  async getLastTrade(symbol: string): Promise<JsonObject | null> {
    const trades = await this.marketData.getStockLatestTrade({ symbolOrSymbols: symbol });
    const trade = trades[symbol] ?? Object.values(trades)[0];
    return trade ? toJsonObject(trade) : null;
  }

  /** Most recent bar of the given timeframe, or null when none falls in the look-back window. */
  async getLastBar(symbol: string, timeframe: TimeFrameInput = '1Min'): Promise<JsonObject | null> {
    const tf = parseTimeFrame(timeframe);
    const set = await this.marketData.getStockBars({
      symbolOrSymbols: symbol,
      timeframe: tf,
      start: new Date(Date.now() - LAST_BAR_LOOKBACK_DAYS[tf.unit] * DAY_MS),
      limit: 1,
      sort: 'desc',
    });
    const [bar] = set.get(symbol);
    return bar ? toJsonObject(bar) : null;
  }

  async getHistoricalBars(
    symbol: string,
    timeframe: TimeFrameInput,
    start: string | Date,
    end: string | Date,
    limit?: number,
  ): Promise<JsonObject[]> {
    const set = await this.marketData.getStockBars({
      symbolOrSymbols: symbol,
      timeframe: parseTimeFrame(timeframe),
      start: parseDateInput(start, 'start'),
      end: parseDateInput(end, 'end'),
      limit,
    });
    return toJsonList(set.get(symbol));
  }

  // live streaming

  private ensureStream(): StockDataStream {
    this.stream ??= new StockDataStream({
      apiKey: this.apiKey,
      secretKey: this.secretKey,
      feed: this.feed,
      url: this.streamURL,
      logger: this.logger,
    });
    return this.stream;
  }

  /**
   * Streams one-minute bars for `symbols`, calling `callback` with each bar as
   * JSON. Resolves only when the stream closes (see `stopStream`).
   */
  async subscribePrice(symbols: Iterable<string>, callback: PriceCallback): Promise<void> {
    const stream = this.ensureStream();
    const handler = (bar: Bar) => callback(toJsonObject(bar));
    for (const symbol of symbols) stream.subscribeBars(handler, symbol);
    await stream.run();
  }

  stopStream(): void {
    this.stream?.stop();
  }
}
