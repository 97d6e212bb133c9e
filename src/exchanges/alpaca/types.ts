import { z } from 'zod';

export const ORDER_SIDES = ['buy', 'sell'] as const;
export type OrderSide = (typeof ORDER_SIDES)[number];

export const ORDER_TYPES = ['market', 'limit', 'stop', 'stop_limit', 'trailing_stop'] as const;
export type OrderType = (typeof ORDER_TYPES)[number];

export const TIME_IN_FORCE = ['day', 'gtc', 'opg', 'cls', 'ioc', 'fok'] as const;
export type TimeInForce = (typeof TIME_IN_FORCE)[number];

export const ORDER_CLASSES = ['simple', 'bracket', 'oco', 'oto'] as const;
export type OrderClass = (typeof ORDER_CLASSES)[number];

export type QueryOrderStatus = 'open' | 'closed' | 'all';
export type AssetStatus = 'active' | 'inactive';
export type AssetClass = 'us_equity' | 'us_option' | 'crypto';
export type DataFeed = 'iex' | 'sip';
export type SortDirection = 'asc' | 'desc';

// Trading API wire records. Decimal amounts arrive as strings.

export interface AlpacaAccount {
  id: string;
  account_number?: string;
  status: string;
  currency?: string;
  cash: string;
  portfolio_value: string;
  buying_power: string;
  equity?: string;
  last_equity?: string;
  long_market_value?: string;
  short_market_value?: string;
  daytrade_count?: number;
  pattern_day_trader?: boolean;
  trading_blocked?: boolean;
  shorting_enabled?: boolean;
  created_at?: string;
}

export interface AlpacaPosition {
  asset_id?: string;
  symbol: string;
  exchange?: string;
  asset_class?: string;
  qty: string;
  qty_available?: string;
  side: 'long' | 'short';
  avg_entry_price: string;
  market_value?: string;
  cost_basis?: string;
  unrealized_pl?: string;
  unrealized_plpc?: string;
  current_price?: string;
  lastday_price?: string;
  change_today?: string;
}

export interface AlpacaOrder {
  id: string;
  client_order_id: string;
  symbol: string;
  asset_class?: string;
  qty: string | null;
  notional?: string | null;
  filled_qty: string;
  filled_avg_price?: string | null;
  side: OrderSide;
  type: OrderType;
  order_class?: string;
  time_in_force: TimeInForce;
  status: string;
  limit_price?: string | null;
  stop_price?: string | null;
  trail_percent?: string | null;
  trail_price?: string | null;
  hwm?: string | null;
  extended_hours?: boolean;
  created_at: string;
  updated_at?: string;
  submitted_at?: string;
  filled_at?: string | null;
  canceled_at?: string | null;
  legs?: AlpacaOrder[] | null;
}

export interface AlpacaAsset {
  id: string;
  class: AssetClass;
  exchange: string;
  symbol: string;
  name?: string;
  status: AssetStatus;
  tradable: boolean;
  marginable?: boolean;
  shortable?: boolean;
  easy_to_borrow?: boolean;
  fractionable?: boolean;
}

export interface AlpacaClock {
  timestamp: string;
  is_open: boolean;
  next_open: string;
  next_close: string;
}

/** One entry of the multi-status body returned by DELETE /v2/orders. */
export interface AlpacaCancelStatus {
  id: string;
  status: number;
  body?: unknown;
}

/** One entry of the multi-status body returned by DELETE /v2/positions. */
export interface AlpacaClosePositionStatus {
  symbol: string;
  status: number;
  body?: unknown;
}

// Market data wire records (compact keys).

export interface AlpacaWireQuote {
  t: string;
  ax?: string;
  ap: number;
  as: number;
  bx?: string;
  bp: number;
  bs: number;
  c?: string[];
  z?: string;
}

export interface AlpacaWireTrade {
  t: string;
  x?: string;
  p: number;
  s: number;
  i?: number;
  c?: string[];
  z?: string;
}

export interface AlpacaWireBar {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  n?: number;
  vw?: number;
}

export interface LatestQuotesResponse {
  quotes: Record<string, AlpacaWireQuote>;
}

export interface LatestTradesResponse {
  trades: Record<string, AlpacaWireTrade>;
}

export interface BarsPageResponse {
  bars: Record<string, AlpacaWireBar[]> | null;
  next_page_token?: string | null;
}

// Request values

const positive = z.number().finite().positive();

export const orderRequestSchema = z
  .object({
    symbol: z.string().min(1),
    qty: positive.optional(),
    notional: positive.optional(),
    side: z.enum(ORDER_SIDES),
    type: z.enum(ORDER_TYPES),
    timeInForce: z.enum(TIME_IN_FORCE),
    limitPrice: positive.optional(),
    stopPrice: positive.optional(),
    trailPercent: positive.optional(),
    trailPrice: positive.optional(),
    extendedHours: z.boolean().optional(),
    clientOrderId: z.string().min(1).max(128).optional(),
    orderClass: z.enum(ORDER_CLASSES).optional(),
    takeProfit: z.object({ limitPrice: positive }).optional(),
    stopLoss: z.object({ stopPrice: positive, limitPrice: positive.optional() }).optional(),
  })
  .strict()
  .superRefine((o, ctx) => {
    if (o.qty === undefined && o.notional === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['qty'], message: 'either qty or notional is required' });
    }
    if (o.qty !== undefined && o.notional !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['notional'], message: 'qty and notional are mutually exclusive' });
    }
    if ((o.type === 'limit' || o.type === 'stop_limit') && o.limitPrice === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['limitPrice'], message: `${o.type} orders need limitPrice` });
    }
    if ((o.type === 'stop' || o.type === 'stop_limit') && o.stopPrice === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['stopPrice'], message: `${o.type} orders need stopPrice` });
    }
    if (o.type === 'trailing_stop') {
      if (o.trailPercent === undefined && o.trailPrice === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['trailPercent'], message: 'trailing_stop orders need trailPercent or trailPrice' });
      } else if (o.trailPercent !== undefined && o.trailPrice !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['trailPrice'], message: 'trailPercent and trailPrice are mutually exclusive' });
      }
    }
  });

export type OrderRequest = z.input<typeof orderRequestSchema>;

export interface GetOrdersRequest {
  status?: QueryOrderStatus;
  limit?: number;
  after?: Date;
  until?: Date;
  direction?: SortDirection;
  nested?: boolean;
  symbols?: string[];
}

export interface GetAssetsRequest {
  status?: AssetStatus;
  assetClass?: AssetClass;
  exchange?: string;
}

export interface StockLatestRequest {
  symbolOrSymbols: string | string[];
  feed?: DataFeed;
}
