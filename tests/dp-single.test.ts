import { describe, it, expect } from 'vitest';
import { findBestTrade, simulateDpSingle } from '../src/strategy/dp-single.js';
import { makeSeries, valuesOf } from './helpers/series.js';

const params = { initialCapital: 1000, smaWindow: 5 };

describe('findBestTrade', () => {
  it('should find the max single profit pair', () => {
    expect(findBestTrade([10, 5, 14, 3, 12])).toEqual({ buyDay: 1, sellDay: 2, profit: 9 });
  });

  it('should keep the earliest pair on equal profit', () => {
    expect(findBestTrade([5, 8, 5, 8])).toEqual({ buyDay: 0, sellDay: 1, profit: 3 });
    expect(findBestTrade([4, 6, 1, 3])).toEqual({ buyDay: 0, sellDay: 1, profit: 2 });
  });

  it('should return null when prices never rise', () => {
    expect(findBestTrade([100, 90, 80, 70])).toBeNull();
    expect(findBestTrade([50, 50, 50])).toBeNull();
    expect(findBestTrade([1])).toBeNull();
    expect(findBestTrade([])).toBeNull();
  });
});

describe('simulateDpSingle', () => {
  it('should not trade on strictly decreasing prices', () => {
    const run = simulateDpSingle(makeSeries([100, 90, 80, 70]), params);
    expect(valuesOf(run)).toEqual([1000, 1000, 1000, 1000]);
    expect(run.trades).toEqual([]);
  });

  it('should buy at 5 and sell at 14', () => {
    const run = simulateDpSingle(makeSeries([10, 5, 14, 3, 12]), params);

    expect(valuesOf(run)).toEqual([1000, 1000, 2800, 2800, 2800]);
    expect(run.trades.map((t) => [t.type, t.dayIndex, t.price, t.shares, t.cash])).toEqual([
      ['BUY', 1, 5, 200, 0],
      ['SELL', 2, 14, 200, 2800],
    ]);
  });

  it('should keep the floor-division remainder as cash', () => {
    const run = simulateDpSingle(makeSeries([3, 7]), { initialCapital: 10, smaWindow: 5 });
    // 3주 @3 → 잔액 1, 3*7 + 1 = 22
    expect(valuesOf(run)).toEqual([10, 22]);
  });

  it('should never end below initial capital', () => {
    const cases = [
      [10, 9, 8, 12, 7, 6],
      [1, 2, 3, 4],
      [9, 1, 1, 1],
      [2.5, 2.25, 3.75, 1.5],
    ];
    for (const prices of cases) {
      const values = valuesOf(simulateDpSingle(makeSeries(prices), params));
      expect(values[values.length - 1]).toBeGreaterThanOrEqual(1000);
    }
  });

  it('should return a flat series for a single point and empty for no points', () => {
    expect(valuesOf(simulateDpSingle(makeSeries([42]), params))).toEqual([1000]);
    expect(simulateDpSingle([], params).values).toEqual([]);
  });

  it('should align timestamps and be deterministic', () => {
    const series = makeSeries([10, 5, 14, 3, 12]);
    const a = simulateDpSingle(series, params);
    const b = simulateDpSingle(series, params);
    expect(a.values.map((v) => v.timestamp)).toEqual(series.map((p) => p.timestamp));
    expect(a).toEqual(b);
  });
});
