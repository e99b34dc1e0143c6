import type { PriceSeries } from '../../src/types/index.js';

export const DAY_MS = 24 * 3600 * 1000;
export const START_MS = Date.UTC(2024, 0, 1);

/** 일별 종가 → PriceSeries (2024-01-01 부터 하루 간격) */
export function makeSeries(prices: readonly number[], start: number = START_MS): PriceSeries {
  return prices.map((close, i) => ({ timestamp: start + i * DAY_MS, close }));
}

export function valuesOf(run: { values: readonly { value: number }[] }): number[] {
  return run.values.map((v) => v.value);
}
