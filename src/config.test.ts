import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

const base = { ALPACA_API_KEY_ID: 'test-key', ALPACA_API_SECRET_KEY: 'test-secret' };

describe('loadConfig', () => {
  it('fills defaults for a paper account', () => {
    const cfg = loadConfig(base);
    expect(cfg.paper).toBe(true);
    expect(cfg.ALPACA_DATA_FEED).toBe('iex');
    expect(cfg.HTTP_TIMEOUT_MS).toBe(8000);
    expect(cfg.ALPACA_PAPER_BASE_URL).toBe('https://paper-api.alpaca.markets');
    expect(cfg.ALPACA_STREAM_BASE_URL).toBe('wss://stream.data.alpaca.markets/v2');
    expect(cfg.LOG_LEVEL).toBe('info');
  });

  it('switches to live only when ALPACA_PAPER is false', () => {
    expect(loadConfig({ ...base, ALPACA_PAPER: 'false' }).paper).toBe(false);
    expect(loadConfig({ ...base, ALPACA_PAPER: 'FALSE' }).paper).toBe(false);
    expect(loadConfig({ ...base, ALPACA_PAPER: 'true' }).paper).toBe(true);
  });

  it('coerces numeric settings', () => {
    expect(loadConfig({ ...base, HTTP_TIMEOUT_MS: '2500' }).HTTP_TIMEOUT_MS).toBe(2500);
  });

  it('rejects missing credentials and unknown feeds', () => {
    expect(() => loadConfig({ ALPACA_API_KEY_ID: 'test-key' })).toThrow(/Invalid configuration/);
    expect(() => loadConfig({ ...base, ALPACA_DATA_FEED: 'otc' })).toThrow(/Invalid configuration/);
  });
});
