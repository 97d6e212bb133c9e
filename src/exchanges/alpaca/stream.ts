import pino from 'pino';
import WebSocket from 'ws';
import { z } from 'zod';
import type { Logger } from 'pino';
import { StreamError } from '../../errors';
import { ALPACA_ENDPOINTS } from './http';
import { Bar } from './models';
import type { DataFeed } from './types';

const successMessageSchema = z.object({
  T: z.literal('success'),
  msg: z.string(),
});

const errorMessageSchema = z.object({
  T: z.literal('error'),
  code: z.number(),
  msg: z.string(),
});

const subscriptionMessageSchema = z.object({
  T: z.literal('subscription'),
  bars: z.array(z.string()).optional(),
});

const barMessageSchema = z.object({
  T: z.enum(['b', 'd', 'u']), // minute, daily, updated
  S: z.string(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number(),
  t: z.string(),
  n: z.number().optional(),
  vw: z.number().optional(),
});

const streamMessageSchema = z.union([
  successMessageSchema,
  errorMessageSchema,
  subscriptionMessageSchema,
  barMessageSchema,
]);

type StreamMessage = z.infer<typeof streamMessageSchema>;

export type BarHandler = (bar: Bar) => void | Promise<void>;

export interface StockDataStreamOptions {
  apiKey: string;
  secretKey: string;
  feed?: DataFeed;
  /** Stream base URL; the feed name is appended as the last path segment. */
  url?: string;
  logger?: Logger;
}

function decode(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Real-time stock bars over the market data WebSocket.
 *
 * Handlers are registered before `run()`; the subscription is sent once the
 * server confirms authentication. There is no reconnect: `run()` settles when
 * the socket closes.
 */
export class StockDataStream {
  private readonly apiKey: string;
  private readonly secretKey: string;
  private readonly endpoint: string;
  private readonly logger: Logger;
  private readonly barHandlers = new Map<string, BarHandler>();
  private ws: WebSocket | null = null;
  private running: Promise<void> | null = null;
  private authenticated = false;

  constructor(opts: StockDataStreamOptions) {
    this.apiKey = opts.apiKey;
    this.secretKey = opts.secretKey;
    this.endpoint = `${(opts.url ?? ALPACA_ENDPOINTS.stream).replace(/\/+$/, '')}/${opts.feed ?? 'iex'}`;
    this.logger = opts.logger ?? pino({ level: process.env.LOG_LEVEL ?? 'info' });
  }

  get url(): string {
    return this.endpoint;
  }

  get subscribedBars(): string[] {
    return Array.from(this.barHandlers.keys());
  }

  /**
   * `*` receives bars for every symbol that has no handler of its own. A symbol
   * keeps only its latest handler; registering it again replaces the earlier one.
   */
  subscribeBars(handler: BarHandler, ...symbols: string[]): void {
    for (const symbol of symbols) this.barHandlers.set(symbol, handler);
    if (this.authenticated && symbols.length > 0) {
      this.send({ action: 'subscribe', bars: symbols });
    }
  }

  /** Calling it again while connected returns the same promise instead of opening a second socket. */
  run(): Promise<void> {
    this.running ??= this.connect().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  private connect(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let failure: Error | null = null;
      const ws = new WebSocket(this.endpoint);
      this.ws = ws;
      this.logger.info({ url: this.endpoint }, 'stream connecting');

      ws.on('message', (data: WebSocket.RawData) => {
        for (const msg of this.parse(data)) {
          const err = this.handle(msg);
          if (err) {
            failure = err;
            ws.close();
          }
        }
      });

      ws.on('error', (err: Error) => {
        this.logger.error({ err }, 'stream socket error');
        if (!this.authenticated) failure ??= err;
      });

      ws.on('close', (code: number, reason: Buffer) => {
        this.logger.info({ code, reason: reason.toString() }, 'stream closed');
        this.ws = null;
        this.authenticated = false;
        if (failure) reject(failure);
        else resolve();
      });
    });
  }

  stop(): void {
    this.ws?.close();
  }

  private parse(data: WebSocket.RawData): StreamMessage[] {
    let payload: unknown;
    try {
      payload = JSON.parse(decode(data));
    } catch (err) {
      this.logger.warn({ err }, 'stream sent a frame that is not JSON');
      return [];
    }
    const items: unknown[] = Array.isArray(payload) ? payload : [payload];
    const messages: StreamMessage[] = [];
    for (const item of items) {
      const parsed = streamMessageSchema.safeParse(item);
      if (parsed.success) messages.push(parsed.data);
      else this.logger.debug({ item }, 'ignoring stream message');
    }
    return messages;
  }

  /** Returns an error when the server reports one; the caller closes the socket. */
  private handle(msg: StreamMessage): StreamError | null {
    switch (msg.T) {
      case 'success':
        if (msg.msg === 'connected') {
          this.send({ action: 'auth', key: this.apiKey, secret: this.secretKey });
        } else if (msg.msg === 'authenticated') {
          this.authenticated = true;
          this.logger.info('stream authenticated');
          const bars = this.subscribedBars;
          if (bars.length > 0) this.send({ action: 'subscribe', bars });
        }
        return null;
      case 'error':
        this.logger.error({ code: msg.code, msg: msg.msg }, 'stream error message');
        return new StreamError(msg.msg, msg.code);
      case 'subscription':
        this.logger.info({ bars: msg.bars }, 'stream subscription updated');
        return null;
      default:
        this.dispatch(
          new Bar(msg.S, { t: msg.t, o: msg.o, h: msg.h, l: msg.l, c: msg.c, v: msg.v, n: msg.n, vw: msg.vw }),
        );
        return null;
    }
  }

  private dispatch(bar: Bar): void {
    const handler = this.barHandlers.get(bar.symbol) ?? this.barHandlers.get('*');
    if (!handler) return;
    void Promise.resolve()
      .then(() => handler(bar))
      .catch((err: unknown) => {
        this.logger.error({ err, symbol: bar.symbol }, 'bar handler failed');
      });
  }

  // a socket closed by stop() mid-handshake still delivers the server's replies
  private send(message: Record<string, unknown>): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      this.logger.debug({ action: message.action }, 'stream socket is not open, dropping message');
      return;
    }
    this.ws.send(JSON.stringify(message));
  }
}
