import { ValidationError } from '../../errors';

export enum TimeFrameUnit {
  Minute = 'Min',
  Hour = 'Hour',
  Day = 'Day',
  Week = 'Week',
  Month = 'Month',
}

const MONTH_AMOUNTS = [1, 2, 3, 6, 12];

/** Bar aggregation period, serialized as the data API's `timeframe` code (e.g. `15Min`). */
export class TimeFrame {
  constructor(
    readonly amount: number,
    readonly unit: TimeFrameUnit,
  ) {
    if (!Number.isInteger(amount) || amount < 1) {
      throw new ValidationError(`timeframe amount must be a positive integer, got ${amount}`, 'timeframe');
    }
    if (unit === TimeFrameUnit.Minute && amount > 59) {
      throw new ValidationError('minute timeframes go up to 59Min', 'timeframe');
    }
    if (unit === TimeFrameUnit.Hour && amount > 23) {
      throw new ValidationError('hour timeframes go up to 23Hour', 'timeframe');
    }
    if ((unit === TimeFrameUnit.Day || unit === TimeFrameUnit.Week) && amount !== 1) {
      throw new ValidationError(`${unit} timeframes only support an amount of 1`, 'timeframe');
    }
    if (unit === TimeFrameUnit.Month && !MONTH_AMOUNTS.includes(amount)) {
      throw new ValidationError(`month timeframes support ${MONTH_AMOUNTS.join(', ')}`, 'timeframe');
    }
  }

  static readonly Minute = new TimeFrame(1, TimeFrameUnit.Minute);
  static readonly Hour = new TimeFrame(1, TimeFrameUnit.Hour);
  static readonly Day = new TimeFrame(1, TimeFrameUnit.Day);
  static readonly Week = new TimeFrame(1, TimeFrameUnit.Week);
  static readonly Month = new TimeFrame(1, TimeFrameUnit.Month);

  toString(): string {
    return `${this.amount}${this.unit}`;
  }
}
