import pino from 'pino';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { ValidationError } from '../../errors';
import { ALPACA_ENDPOINTS, createAlpacaClient } from './http';
import { orderRequestSchema } from './types';
import type {
  AlpacaAccount,
  AlpacaAsset,
  AlpacaCancelStatus,
  AlpacaClock,
  AlpacaClosePositionStatus,
  AlpacaOrder,
  AlpacaPosition,
  GetAssetsRequest,
  GetOrdersRequest,
  OrderRequest,
} from './types';

export interface TradingClientOptions {
  apiKey: string;
  secretKey: string;
  paper?: boolean;
  baseURL?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  logger?: Logger;
}

type OrderPayload = Record<string, string | boolean | Record<string, string>>;

const decimal = (n: number | undefined): string | undefined => (n === undefined ? undefined : String(n));

function legPayload(leg: { stopPrice?: number; limitPrice?: number }): Record<string, string> {
  const out: Record<string, string> = {};
  if (leg.stopPrice !== undefined) out.stop_price = String(leg.stopPrice);
  if (leg.limitPrice !== undefined) out.limit_price = String(leg.limitPrice);
  return out;
}

/** Validates an order request and renders it in the orders endpoint's snake_case form. */
export function toOrderPayload(input: OrderRequest): OrderPayload {
  const parsed = orderRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'order'}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid order request: ${detail}`, field);
  }
  const o = parsed.data;
  const fields: Record<string, string | boolean | Record<string, string> | undefined> = {
    symbol: o.symbol,
    qty: decimal(o.qty),
    notional: decimal(o.notional),
    side: o.side,
    type: o.type,
    time_in_force: o.timeInForce,
    limit_price: decimal(o.limitPrice),
    stop_price: decimal(o.stopPrice),
    trail_percent: decimal(o.trailPercent),
    trail_price: decimal(o.trailPrice),
    extended_hours: o.extendedHours,
    client_order_id: o.clientOrderId,
    order_class: o.orderClass,
    take_profit: o.takeProfit && legPayload(o.takeProfit),
    stop_loss: o.stopLoss && legPayload(o.stopLoss),
  };
  const payload: OrderPayload = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) payload[key] = value;
  }
  return payload;
}

/** Account, order, position and asset endpoints of the trading API. */
export class TradingClient {
  private readonly http: AxiosInstance;
  readonly paper: boolean;

  constructor(opts: TradingClientOptions) {
    this.paper = opts.paper ?? true;
    this.http = createAlpacaClient({
      apiKey: opts.apiKey,
      secretKey: opts.secretKey,
      baseURL: opts.baseURL ?? (this.paper ? ALPACA_ENDPOINTS.paper : ALPACA_ENDPOINTS.live),
      timeoutMs: opts.timeoutMs,
      adapter: opts.adapter,
      logger: opts.logger ?? pino({ level: process.env.LOG_LEVEL ?? 'info' }),
    });
  }

  async getAccount(): Promise<AlpacaAccount> {
    const res = await this.http.get<AlpacaAccount>('/v2/account');
    return res.data;
  }

  async getAllPositions(): Promise<AlpacaPosition[]> {
    const res = await this.http.get<AlpacaPosition[]>('/v2/positions');
    return res.data;
  }

  async getPosition(symbol: string): Promise<AlpacaPosition> {
    const res = await this.http.get<AlpacaPosition>(`/v2/positions/${encodeURIComponent(symbol)}`);
    return res.data;
  }

  async closePosition(symbol: string): Promise<AlpacaOrder> {
    const res = await this.http.delete<AlpacaOrder>(`/v2/positions/${encodeURIComponent(symbol)}`);
    return res.data;
  }

  async closeAllPositions(cancelOrders = false): Promise<AlpacaClosePositionStatus[]> {
    const res = await this.http.delete<AlpacaClosePositionStatus[]>('/v2/positions', {
      params: { cancel_orders: cancelOrders },
    });
    return res.data ?? [];
  }

  async submitOrder(order: OrderRequest): Promise<AlpacaOrder> {
    const res = await this.http.post<AlpacaOrder>('/v2/orders', toOrderPayload(order));
    return res.data;
  }

  async getOrders(req: GetOrdersRequest = {}): Promise<AlpacaOrder[]> {
    const res = await this.http.get<AlpacaOrder[]>('/v2/orders', {
      params: {
        status: req.status,
        limit: req.limit,
        after: req.after?.toISOString(),
        until: req.until?.toISOString(),
        direction: req.direction,
        nested: req.nested,
        symbols: req.symbols?.join(','),
      },
    });
    return res.data;
  }

  async getOrderById(orderId: string): Promise<AlpacaOrder> {
    const res = await this.http.get<AlpacaOrder>(`/v2/orders/${encodeURIComponent(orderId)}`);
    return res.data;
  }

  async cancelOrderById(orderId: string): Promise<void> {
    await this.http.delete(`/v2/orders/${encodeURIComponent(orderId)}`);
  }

  async cancelOrders(): Promise<AlpacaCancelStatus[]> {
    const res = await this.http.delete<AlpacaCancelStatus[]>('/v2/orders');
    return res.data ?? [];
  }

  async getAllAssets(req: GetAssetsRequest = {}): Promise<AlpacaAsset[]> {
    const res = await this.http.get<AlpacaAsset[]>('/v2/assets', {
      params: { status: req.status, asset_class: req.assetClass, exchange: req.exchange },
    });
    return res.data;
  }

  async getClock(): Promise<AlpacaClock> {
    const res = await this.http.get<AlpacaClock>('/v2/clock');
    return res.data;
  }
}
