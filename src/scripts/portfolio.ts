import 'dotenv/config';
import pino from 'pino';
import { SimpleAlpaca } from '../simpleAlpaca';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

async function main(): Promise<void> {
  const api = SimpleAlpaca.fromEnv(process.env, logger);
  const summary = await api.portfolioSummary();
  console.log(`cash: $${String(summary.cash)}  buying power: $${String(summary.buying_power)}  value: $${String(summary.portfolio_value)}`);
  if (!summary.positions.length) {
    console.log('No open positions.');
    return;
  }
  console.table(
    summary.positions.map((p) => ({
      Symbol: p.symbol,
      Qty: p.qty,
      AvgEntry: p.avg_entry_price,
      MarketValue: p.market_value,
      UnrealizedPL: p.unrealized_pl,
    })),
  );
}

main().catch((err) => {
  logger.error({ err }, 'portfolio failed');
  process.exit(1);
});
