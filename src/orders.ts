import { ValidationError } from './errors';
import { TIME_IN_FORCE } from './exchanges/alpaca/types';
import type { OrderSide, TimeInForce } from './exchanges/alpaca/types';

export function isTimeInForce(value: string): value is TimeInForce {
  return TIME_IN_FORCE.some((tif) => tif === value);
}

/** 'b', 'BUY', 'buy_to_open' → buy; everything else → sell. */
export function coerceSide(side: string): OrderSide {
  return side.toLowerCase().startsWith('b') ? 'buy' : 'sell';
}

export function coerceTimeInForce(tif: TimeInForce | string = 'day'): TimeInForce {
  if (isTimeInForce(tif)) return tif;
  const lowered = tif.toLowerCase();
  if (!isTimeInForce(lowered)) {
    throw new ValidationError(`unknown time in force "${tif}"; expected one of ${TIME_IN_FORCE.join(', ')}`, 'timeInForce');
  }
  return lowered;
}

export function parseDateInput(value: string | Date, field: string): Date {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} is not a valid date: ${String(value)}`, field);
  }
  return date;
}
