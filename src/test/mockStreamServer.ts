import WebSocket, { WebSocketServer } from 'ws';

export interface MockStreamOptions {
  validKey?: string;
  /** Called with valid credentials, before `authenticated` is sent. */
  onAuth?: (socket: WebSocket) => void;
  /** Called after the subscription is acknowledged. */
  onSubscribe?: (socket: WebSocket, bars: string[]) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function barMessage(symbol: string, close: number, t = '2024-03-01T14:30:00Z'): Record<string, unknown> {
  return { T: 'b', S: symbol, o: close - 1, h: close + 1, l: close - 2, c: close, v: 100, t, n: 5, vw: close - 0.5 };
}

/** Speaks the market data stream's handshake on an ephemeral local port. */
export class MockStreamServer {
  readonly received: unknown[] = [];
  connections = 0;
  private server: WebSocketServer | null = null;

  constructor(private readonly opts: MockStreamOptions = {}) {}

  start(): Promise<string> {
    const validKey = this.opts.validKey ?? 'test-key';
    return new Promise((resolve, reject) => {
      const server = new WebSocketServer({ host: '127.0.0.1', port: 0 }, () => {
        const address = server.address();
        if (typeof address === 'string' || address === null) {
          reject(new Error(`unexpected pipe address ${address}`));
          return;
        }
        resolve(`ws://127.0.0.1:${address.port}`);
      });
      this.server = server;

      server.on('connection', (socket: WebSocket) => {
        this.connections += 1;
        socket.send(JSON.stringify([{ T: 'success', msg: 'connected' }]));
        socket.on('message', (data: WebSocket.RawData) => {
          const msg: unknown = JSON.parse(data.toString());
          this.received.push(msg);
          if (!isRecord(msg)) return;
          if (msg.action === 'auth') {
            if (msg.key === validKey) {
              this.opts.onAuth?.(socket);
              socket.send(JSON.stringify([{ T: 'success', msg: 'authenticated' }]));
            } else {
              socket.send(JSON.stringify([{ T: 'error', code: 402, msg: 'auth failed' }]));
            }
          } else if (msg.action === 'subscribe') {
            const bars = Array.isArray(msg.bars) ? msg.bars.filter((s): s is string => typeof s === 'string') : [];
            socket.send(JSON.stringify([{ T: 'subscription', trades: [], quotes: [], bars }]));
            this.opts.onSubscribe?.(socket, bars);
          }
        });
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    for (const client of server.clients) client.terminate();
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
