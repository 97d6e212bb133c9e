import { z } from 'zod';

const configSchema = z.object({
  ALPACA_API_KEY_ID: z.string().min(1),
  ALPACA_API_SECRET_KEY: z.string().min(1),
  ALPACA_PAPER: z.string().optional(),
  ALPACA_PAPER_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
  ALPACA_LIVE_BASE_URL: z.string().url().default('https://api.alpaca.markets'),
  ALPACA_DATA_BASE_URL: z.string().url().default('https://data.alpaca.markets'),
  ALPACA_STREAM_BASE_URL: z.string().url().default('wss://stream.data.alpaca.markets/v2'),
  ALPACA_DATA_FEED: z.enum(['iex', 'sip']).default('iex'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.string().default('info'),
});

export type AppConfig = z.infer<typeof configSchema> & {
  paper: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.toString()}`);
  }
  const cfg = parsed.data;
  return {
    ...cfg,
    // live trading only when explicitly switched off
    paper: (cfg.ALPACA_PAPER ?? 'true').toLowerCase() !== 'false',
  };
}
