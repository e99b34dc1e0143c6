import type {
  PriceSeries,
  SimulationParams,
  SimulationRun,
  TradeObserver,
  ValuePoint,
} from '../types/index.js';
import { AllInPosition } from '../engine/all-in-position.js';
import { SMA } from '../indicators/sma.js';
import { resolveParams } from './params.js';
import type { Strategy } from './strategy.js';

/**
 * SMA 추세추종 (greedy)
 *
 * 진입: 종가 > SMA 이고 미보유 → 전액 매수
 * 청산: 종가 < SMA 이고 보유 → 전량 매도
 * 종가 == SMA 는 무시. SMA 가 정의되기 전(앞 window-1 일)은 거래 없이 초기 자본 그대로
 */
export function simulateSmaTrend(
  series: PriceSeries,
  params: SimulationParams,
  observer?: TradeObserver,
): SimulationRun {
  const { initialCapital, smaWindow } = resolveParams(params);
  const sma = new SMA(smaWindow);
  const position = new AllInPosition(initialCapital, observer);
  const values: ValuePoint[] = [];

  series.forEach((point, i) => {
    sma.update(point.close);
    if (!sma.isReady) {
      values.push({ timestamp: point.timestamp, value: initialCapital });
      return;
    }

    const price = point.close;
    const avg = sma.value;
    if (price > avg && !position.isHolding) {
      position.buyAll(i, point);
    } else if (price < avg && position.isHolding) {
      position.sellAll(i, point);
    }

    values.push({ timestamp: point.timestamp, value: position.valueAt(price) });
  });

  return { values, trades: position.getTrades() };
}

export const smaTrendStrategy: Strategy = {
  id: 'sma-trend',
  name: 'SMA Trend (greedy)',
  simulate: simulateSmaTrend,
};
