export { SimpleAlpaca } from './simpleAlpaca';
export type {
  PortfolioSummary,
  PriceCallback,
  SimpleAlpacaOptions,
  TimeFrameInput,
  TrailingStopOptions,
} from './simpleAlpaca';
export { loadConfig } from './config';
export type { AppConfig } from './config';
export { StreamError, ValidationError } from './errors';
export { classifyShape, isJsonObject, toJson, toJsonObject } from './normalize';
export type { JsonObject, JsonPrimitive, JsonValue, Shape } from './normalize';
export { coerceSide, coerceTimeInForce, isTimeInForce, parseDateInput } from './orders';
export { parseTimeFrame } from './timeframe';
export * from './exchanges/alpaca';
