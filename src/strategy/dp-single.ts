import type {
  PriceSeries,
  SimulationParams,
  SimulationRun,
  TradeObserver,
  ValuePoint,
} from '../types/index.js';
import { AllInPosition } from '../engine/all-in-position.js';
import { InsufficientDataError, NoProfitableTransactionError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { flatSeries, resolveParams } from './params.js';
import type { Strategy } from './strategy.js';

const log = createChildLogger('dp-single');

export interface BestTrade {
  readonly buyDay: number;
  readonly sellDay: number;
  readonly profit: number;      // 주당 이익
}

/**
 * 최대 단일 이익 (한 번 사고 한 번 팔기), O(n)
 * 이익이 같으면 먼저 나온 쌍 유지. 이익 > 0 인 쌍이 없으면 null
 */
export function findBestTrade(prices: readonly number[]): BestTrade | null {
  if (prices.length < 2) return null;

  let minPrice = prices[0] ?? Infinity;
  let minDay = 0;
  let best: BestTrade | null = null;

  for (let i = 1; i < prices.length; i++) {
    const price = prices[i] ?? minPrice;
    const profit = price - minPrice;
    if (profit > (best?.profit ?? 0)) {
      best = { buyDay: minDay, sellDay: i, profit };
    }
    if (price < minPrice) {
      minPrice = price;
      minDay = i;
    }
  }

  return best;
}

export function simulateDpSingle(
  series: PriceSeries,
  params: SimulationParams,
  observer?: TradeObserver,
): SimulationRun {
  const { initialCapital } = resolveParams(params);
  if (series.length < 2) {
    log.debug({ err: new InsufficientDataError(series.length) }, 'Flat series');
    return { values: flatSeries(series, initialCapital), trades: [] };
  }

  const best = findBestTrade(series.map((p) => p.close));
  if (best === null) {
    log.debug({ err: new NoProfitableTransactionError(), days: series.length }, 'Holding cash');
    return { values: flatSeries(series, initialCapital), trades: [] };
  }

  const position = new AllInPosition(initialCapital, observer);
  const values: ValuePoint[] = series.map((point, i) => {
    if (i === best.buyDay) position.buyAll(i, point);
    else if (i === best.sellDay) position.sellAll(i, point);
    return { timestamp: point.timestamp, value: position.valueAt(point.close) };
  });

  return { values, trades: position.getTrades() };
}

export const dpSingleStrategy: Strategy = {
  id: 'dp-single',
  name: 'DP Single Transaction',
  simulate: simulateDpSingle,
};
