import type { AlpacaWireBar, AlpacaWireQuote, AlpacaWireTrade } from './types';

export class Quote {
  readonly timestamp: Date;
  readonly askExchange?: string;
  readonly askPrice: number;
  readonly askSize: number;
  readonly bidExchange?: string;
  readonly bidPrice: number;
  readonly bidSize: number;
  readonly conditions: string[];
  readonly tape?: string;

  constructor(
    readonly symbol: string,
    raw: AlpacaWireQuote,
  ) {
    this.timestamp = new Date(raw.t);
    this.askExchange = raw.ax;
    this.askPrice = raw.ap;
    this.askSize = raw.as;
    this.bidExchange = raw.bx;
    this.bidPrice = raw.bp;
    this.bidSize = raw.bs;
    this.conditions = raw.c ?? [];
    this.tape = raw.z;
  }

  toJSON(): Record<string, unknown> {
    return {
      symbol: this.symbol,
      timestamp: this.timestamp,
      ask_exchange: this.askExchange,
      ask_price: this.askPrice,
      ask_size: this.askSize,
      bid_exchange: this.bidExchange,
      bid_price: this.bidPrice,
      bid_size: this.bidSize,
      conditions: this.conditions,
      tape: this.tape,
    };
  }
}

export class Trade {
  readonly timestamp: Date;
  readonly exchange?: string;
  readonly price: number;
  readonly size: number;
  readonly id?: number;
  readonly conditions: string[];
  readonly tape?: string;

  constructor(
    readonly symbol: string,
    raw: AlpacaWireTrade,
  ) {
    this.timestamp = new Date(raw.t);
    this.exchange = raw.x;
    this.price = raw.p;
    this.size = raw.s;
    this.id = raw.i;
    this.conditions = raw.c ?? [];
    this.tape = raw.z;
  }

  toJSON(): Record<string, unknown> {
    return {
      symbol: this.symbol,
      timestamp: this.timestamp,
      exchange: this.exchange,
      price: this.price,
      size: this.size,
      id: this.id,
      conditions: this.conditions,
      tape: this.tape,
    };
  }
}

export class Bar {
  readonly timestamp: Date;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly tradeCount?: number;
  readonly vwap?: number;

  constructor(
    readonly symbol: string,
    raw: AlpacaWireBar,
  ) {
    this.timestamp = new Date(raw.t);
    this.open = raw.o;
    this.high = raw.h;
    this.low = raw.l;
    this.close = raw.c;
    this.volume = raw.v;
    this.tradeCount = raw.n;
    this.vwap = raw.vw;
  }

  toJSON(): Record<string, unknown> {
    return {
      symbol: this.symbol,
      timestamp: this.timestamp,
      open: this.open,
      high: this.high,
      low: this.low,
      close: this.close,
      volume: this.volume,
      trade_count: this.tradeCount,
      vwap: this.vwap,
    };
  }
}

/** Bars grouped by symbol, in the order the API returned them. */
export class BarSet {
  readonly data: Record<string, Bar[]> = {};

  add(symbol: string, raws: AlpacaWireBar[]): void {
    const bars = (this.data[symbol] ??= []);
    for (const raw of raws) bars.push(new Bar(symbol, raw));
  }

  get(symbol: string): Bar[] {
    return this.data[symbol] ?? [];
  }

  get size(): number {
    return Object.values(this.data).reduce((n, bars) => n + bars.length, 0);
  }

  toJSON(): Record<string, Bar[]> {
    return this.data;
  }
}
