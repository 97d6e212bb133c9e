import { afterEach, describe, expect, it } from 'vitest';
import { StreamError } from '../../errors';
import { silentLogger } from '../../test/fakeAlpaca';
import { MockStreamServer, barMessage } from '../../test/mockStreamServer';
import type { Bar } from './models';
import { StockDataStream } from './stream';

describe('StockDataStream', () => {
  let server: MockStreamServer | null = null;

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  async function startServer(opts: ConstructorParameters<typeof MockStreamServer>[0]): Promise<string> {
    server = new MockStreamServer(opts);
    return server.start();
  }

  it('builds the feed endpoint from the base URL', () => {
    expect(new StockDataStream({ apiKey: 'k', secretKey: 's', feed: 'sip' }).url).toBe(
      'wss://stream.data.alpaca.markets/v2/sip',
    );
    expect(new StockDataStream({ apiKey: 'k', secretKey: 's', url: 'ws://localhost:9000/' }).url).toBe(
      'ws://localhost:9000/iex',
    );
  });

  it('authenticates, subscribes and dispatches bars by symbol', async () => {
    const url = await startServer({
      onSubscribe: (socket) => {
        socket.send(JSON.stringify([barMessage('AAPL', 181), barMessage('MSFT', 410)]));
        socket.close();
      },
    });
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });
    const received: Bar[] = [];
    stream.subscribeBars((bar) => {
      received.push(bar);
    }, 'AAPL');

    await stream.run();

    expect(server?.received).toEqual([
      { action: 'auth', key: 'test-key', secret: 'test-secret' },
      { action: 'subscribe', bars: ['AAPL'] },
    ]);
    expect(received).toHaveLength(1);
    expect(received[0].symbol).toBe('AAPL');
    expect(received[0].close).toBe(181);
    expect(received[0].tradeCount).toBe(5);
    expect(received[0].timestamp.toISOString()).toBe('2024-03-01T14:30:00.000Z');
  });

  it('routes symbols without their own handler to the wildcard handler', async () => {
    const url = await startServer({
      onSubscribe: (socket) => {
        socket.send(JSON.stringify([barMessage('AAPL', 181), barMessage('MSFT', 410)]));
        socket.close();
      },
    });
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });
    const own: string[] = [];
    const wildcard: string[] = [];
    stream.subscribeBars((bar) => {
      own.push(bar.symbol);
    }, 'AAPL');
    stream.subscribeBars((bar) => {
      wildcard.push(bar.symbol);
    }, '*');

    await stream.run();

    expect(own).toEqual(['AAPL']);
    expect(wildcard).toEqual(['MSFT']);
  });

  it('keeps streaming when a handler fails', async () => {
    const url = await startServer({
      onSubscribe: (socket) => {
        socket.send(JSON.stringify([barMessage('AAPL', 1), barMessage('AAPL', 2)]));
        socket.close();
      },
    });
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });
    const closes: number[] = [];
    stream.subscribeBars(async (bar) => {
      closes.push(bar.close);
      if (bar.close === 1) throw new Error('handler blew up');
    }, 'AAPL');

    await stream.run();

    expect(closes).toEqual([1, 2]);
  });

  it('rejects when the server refuses the credentials', async () => {
    const url = await startServer({});
    const stream = new StockDataStream({ apiKey: 'wrong-key', secretKey: 'test-secret', url, logger: silentLogger });
    stream.subscribeBars(() => undefined, 'AAPL');

    const err: unknown = await stream.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StreamError);
    expect(err).toMatchObject({ message: 'auth failed', code: 402 });
    expect(server?.received).toEqual([{ action: 'auth', key: 'wrong-key', secret: 'test-secret' }]);
  });

  it('joins a running stream instead of opening a second socket', async () => {
    let subscribed: () => void = () => undefined;
    const ready = new Promise<void>((resolve) => {
      subscribed = resolve;
    });
    const url = await startServer({ onSubscribe: () => subscribed() });
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });
    stream.subscribeBars(() => undefined, 'SPY');

    const running = stream.run();
    await ready;
    const joined = stream.run();

    stream.stop();
    await expect(running).resolves.toBeUndefined();
    await expect(joined).resolves.toBeUndefined();
    expect(server?.connections).toBe(1);
  });

  it('settles when stopped between auth and the authenticated reply', async () => {
    const holder: { stream: StockDataStream | null } = { stream: null };
    const url = await startServer({ onAuth: () => holder.stream?.stop() });
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });
    holder.stream = stream;
    stream.subscribeBars(() => undefined, 'SPY');

    await expect(stream.run()).resolves.toBeUndefined();

    expect(server?.received).toEqual([{ action: 'auth', key: 'test-key', secret: 'test-secret' }]);
  });

  it('rejects with the socket error when the connection fails', async () => {
    const url = await startServer({});
    await server?.stop();
    server = null;
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });

    const err: unknown = await stream.run().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(Error);
    expect(err).toMatchObject({ code: 'ECONNREFUSED' });
  });

  it('subscribes immediately once authenticated', async () => {
    let authenticated: () => void = () => undefined;
    const ready = new Promise<void>((resolve) => {
      authenticated = resolve;
    });
    const url = await startServer({ onSubscribe: () => authenticated() });
    const stream = new StockDataStream({ apiKey: 'test-key', secretKey: 'test-secret', url, logger: silentLogger });
    stream.subscribeBars(() => undefined, 'SPY');
    const running = stream.run();
    await ready;

    stream.subscribeBars(() => undefined, 'QQQ');
    await expect.poll(() => server?.received.length).toBe(3);
    stream.stop();
    await running;

    expect(server?.received[2]).toEqual({ action: 'subscribe', bars: ['QQQ'] });
    expect(stream.subscribedBars).toEqual(['SPY', 'QQQ']);
  });
});
