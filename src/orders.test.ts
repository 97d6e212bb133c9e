import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import { coerceSide, coerceTimeInForce, parseDateInput } from './orders';

describe('coerceSide', () => {
  it('maps anything starting with b to buy', () => {
    expect(coerceSide('buy')).toBe('buy');
    expect(coerceSide('B')).toBe('buy');
    expect(coerceSide('Buy_to_cover')).toBe('buy');
  });

  it('maps everything else to sell', () => {
    expect(coerceSide('sell')).toBe('sell');
    expect(coerceSide('short')).toBe('sell');
    expect(coerceSide('')).toBe('sell');
  });
});

describe('coerceTimeInForce', () => {
  it('lower-cases strings', () => {
    expect(coerceTimeInForce('GTC')).toBe('gtc');
    expect(coerceTimeInForce('Day')).toBe('day');
  });

  it('passes typed values through and defaults to day', () => {
    expect(coerceTimeInForce('ioc')).toBe('ioc');
    expect(coerceTimeInForce()).toBe('day');
  });

  it('rejects unknown values', () => {
    expect(() => coerceTimeInForce('forever')).toThrow(ValidationError);
    try {
      coerceTimeInForce('forever');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: 'timeInForce' });
    }
  });
});

describe('parseDateInput', () => {
  it('parses ISO strings', () => {
    expect(parseDateInput('2023-01-03', 'start').toISOString()).toBe('2023-01-03T00:00:00.000Z');
    expect(parseDateInput('2023-01-03T15:30:00Z', 'start').toISOString()).toBe('2023-01-03T15:30:00.000Z');
  });

  it('returns dates unchanged', () => {
    const d = new Date('2023-01-10T00:00:00Z');
    expect(parseDateInput(d, 'end')).toBe(d);
  });

  it('rejects unparseable input', () => {
    expect(() => parseDateInput('not-a-date', 'start')).toThrow('start is not a valid date: not-a-date');
  });
});
