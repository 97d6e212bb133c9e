import { ValidationError } from './errors';
import { TimeFrame, TimeFrameUnit } from './exchanges/alpaca/timeframe';

// keyed by the first three letters of the unit token
const UNIT_PREFIXES: Record<string, TimeFrameUnit> = {
  min: TimeFrameUnit.Minute,
  hou: TimeFrameUnit.Hour,
  day: TimeFrameUnit.Day,
  wee: TimeFrameUnit.Week,
  mon: TimeFrameUnit.Month,
};

const COMPACT_FORM = /^(\d+)\s*([a-z]+)$/i;

/**
 * Accepts '1Min', '5Min', '1Hour', '1Day' (and Week/Month), a numeric
 * interval plus a unit, or an existing TimeFrame.
 */
export function parseTimeFrame(
  timeframe: string | number | TimeFrame,
  unit: TimeFrameUnit = TimeFrameUnit.Minute,
): TimeFrame {
  if (timeframe instanceof TimeFrame) return timeframe;
  if (typeof timeframe === 'number') return new TimeFrame(timeframe, unit);

  const match = COMPACT_FORM.exec(timeframe.trim());
  if (!match) {
    throw new ValidationError(`unrecognized timeframe "${timeframe}"`, 'timeframe');
  }
  const [, digits, token] = match;
  const parsedUnit = UNIT_PREFIXES[token.slice(0, 3).toLowerCase()];
  if (!parsedUnit) {
    throw new ValidationError(`unrecognized timeframe unit "${token}"`, 'timeframe');
  }
  return new TimeFrame(Number(digits), parsedUnit);
}
