import { describe, it, expect } from 'vitest';
import { toPriceSeries } from '../src/data/price-series.js';
import { InvalidPriceSeriesError } from '../src/errors.js';

describe('toPriceSeries', () => {
  it('should normalize string, number and Date inputs to Unix ms', () => {
    const series = toPriceSeries([
      { date: '2024-01-02', close: 100 },
      { date: Date.UTC(2024, 0, 3), close: 101.5 },
      { date: new Date(Date.UTC(2024, 0, 5)), close: 99 },
    ]);

    expect(series).toEqual([
      { timestamp: Date.UTC(2024, 0, 2), close: 100 },
      { timestamp: Date.UTC(2024, 0, 3), close: 101.5 },
      { timestamp: Date.UTC(2024, 0, 5), close: 99 },
    ]);
  });

  it('should return an empty series for no records', () => {
    expect(toPriceSeries([])).toEqual([]);
  });

  it('should freeze the result', () => {
    const series = toPriceSeries([{ date: '2024-01-02', close: 1 }]);
    expect(Object.isFrozen(series)).toBe(true);
  });

  it('should reject non-positive closes', () => {
    let caught: unknown;
    try {
      toPriceSeries([
        { date: '2024-01-02', close: 10 },
        { date: '2024-01-03', close: 0 },
      ]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidPriceSeriesError);
    if (caught instanceof InvalidPriceSeriesError) {
      expect(caught.index).toBe(1);
      expect(caught.code).toBe('INVALID_PRICE_SERIES');
    }
  });

  it('should reject non-increasing dates', () => {
    expect(() => toPriceSeries([
      { date: '2024-01-03', close: 10 },
      { date: '2024-01-03', close: 11 },
    ])).toThrow('Point 1: timestamps must be strictly increasing');
  });

  it('should reject unparseable dates', () => {
    expect(() => toPriceSeries([{ date: 'not-a-date', close: 10 }]))
      .toThrow('Point 0: unparseable date not-a-date');
  });
});
