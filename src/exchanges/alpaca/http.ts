import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { Logger } from 'pino';

export const ALPACA_ENDPOINTS = {
  paper: 'https://paper-api.alpaca.markets',
  live: 'https://api.alpaca.markets',
  data: 'https://data.alpaca.markets',
  stream: 'wss://stream.data.alpaca.markets/v2',
} as const;

export interface AlpacaHttpOptions {
  apiKey: string;
  secretKey: string;
  baseURL: string;
  timeoutMs?: number;
  /** Replaces axios' transport; tests use it to answer requests in process. */
  adapter?: AxiosAdapter;
  logger: Logger;
}

export function createAlpacaClient(opts: AlpacaHttpOptions): AxiosInstance {
  const client = axios.create({
    baseURL: opts.baseURL,
    headers: {
      'APCA-API-KEY-ID': opts.apiKey,
      'APCA-API-SECRET-KEY': opts.secretKey,
    },
    timeout: opts.timeoutMs ?? 8000,
    adapter: opts.adapter,
  });

  const { logger } = opts;
  client.interceptors.request.use((config) => {
    logger.debug({ method: config.method, path: config.url, params: config.params }, 'alpaca request');
    return config;
  });
  client.interceptors.response.use(
    (res) => {
      logger.debug({ method: res.config.method, path: res.config.url, status: res.status }, 'alpaca response');
      return res;
    },
    (err: unknown) => {
      if (axios.isAxiosError(err)) {
        logger.error(
          { method: err.config?.method, path: err.config?.url, status: err.response?.status, body: err.response?.data },
          'alpaca request failed',
        );
      }
      // the caller sees the service's error unchanged
      return Promise.reject(err);
    },
  );
  return client;
}
