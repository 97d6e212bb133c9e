import 'dotenv/config';
import pino from 'pino';
import { SimpleAlpaca } from '../simpleAlpaca';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

// usage: tsx src/scripts/streamBars.ts AAPL MSFT
async function main(): Promise<void> {
  const symbols = process.argv.slice(2).map((s) => s.trim().toUpperCase()).filter(Boolean);
  if (!symbols.length) {
    logger.warn('pass at least one symbol, e.g. streamBars.ts AAPL');
    return;
  }
  const api = SimpleAlpaca.fromEnv(process.env, logger);
  process.once('SIGINT', () => api.stopStream());
  await api.subscribePrice(symbols, (bar) => {
    logger.info({ symbol: bar.symbol, close: bar.close, volume: bar.volume, ts: bar.timestamp }, 'bar');
  });
  logger.info('stream ended');
}

main().catch((err) => {
  logger.error({ err }, 'streamBars failed');
  process.exit(1);
});
