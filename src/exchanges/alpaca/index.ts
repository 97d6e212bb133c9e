export { ALPACA_ENDPOINTS, createAlpacaClient } from './http';
export { TradingClient, toOrderPayload } from './tradingClient';
export type { TradingClientOptions } from './tradingClient';
export { StockHistoricalDataClient } from './historicalClient';
export type { StockBarsRequest, StockHistoricalDataClientOptions } from './historicalClient';
export { StockDataStream } from './stream';
export type { BarHandler, StockDataStreamOptions } from './stream';
export { Bar, BarSet, Quote, Trade } from './models';
export { TimeFrame, TimeFrameUnit } from './timeframe';
export * from './types';
