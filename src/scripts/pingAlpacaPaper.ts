import 'dotenv/config';
import pino from 'pino';
import { SimpleAlpaca } from '../simpleAlpaca';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const haveKeys = Boolean(process.env.ALPACA_API_KEY_ID && process.env.ALPACA_API_SECRET_KEY);
  if (!haveKeys) {
    logger.warn('No Alpaca keys in env; create a paper key in dashboard and set .env');
    return;
  }
  const api = SimpleAlpaca.fromEnv(process.env, logger);
  const account = await api.getAccountJson();
  const quote = await api.getLastQuote('AAPL');
  logger.info({ accountStatus: account.status, askPrice: quote?.ask_price, bidPrice: quote?.bid_price }, 'alpaca reachable');
  logger.info(await api.describe());
}

main().catch((err) => {
  logger.error({ err }, 'alpaca ping failed');
  process.exit(1);
});
