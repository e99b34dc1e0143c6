import type {
  PriceSeries,
  SimulationParams,
  SimulationRun,
  TradeObserver,
  Transaction,
  ValuePoint,
} from '../types/index.js';
import { config } from '../config.js';
import { AllInPosition } from '../engine/all-in-position.js';
import { InsufficientDataError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { flatSeries, resolveEpsilon, resolveParams } from './params.js';
import type { Strategy } from './strategy.js';

const log = createChildLogger('dp-multi');

/** 역추적 허용 오차 (상대값). DP_EPSILON 으로 조정 */
export const DP_EPSILON = config.dp.epsilon;

export interface DpTable {
  /** cash[i]: i 일에 현금 상태로 끝날 때 최대 가치 */
  readonly cash: readonly number[];
  /** hold[i]: i 일에 전액 보유 상태로 끝날 때 최대 가치 */
  readonly hold: readonly number[];
}

function approxEqual(a: number, b: number, epsilon: number): boolean {
  return Math.abs(a - b) <= epsilon * Math.max(1, Math.abs(a), Math.abs(b));
}

/**
 * 현금/보유 상태표 전진 계산
 *
 *   r = p[i] / p[i-1]
 *   cash[i] = max(cash[i-1], hold[i-1] * r)   // 유지 vs 오늘 매도
 *   hold[i] = max(hold[i-1] * r, cash[i-1])   // 계속 보유 vs 오늘 매수
 *
 * 보유 가치는 가격 비율로 매일 평가(소수 주식 가정). 실제 재생은 정수 주식이라
 * 두 값이 어긋날 수 있음: 근사로 둠
 */
export function tabulate(prices: readonly number[], initialCapital: number): DpTable {
  const n = prices.length;
  const cash: number[] = new Array<number>(n).fill(0);
  const hold: number[] = new Array<number>(n).fill(0);
  if (n === 0) return { cash, hold };

  cash[0] = initialCapital;
  hold[0] = 0;

  for (let i = 1; i < n; i++) {
    const ratio = prices[i] / prices[i - 1];
    const carried = hold[i - 1] * ratio;
    cash[i] = Math.max(cash[i - 1], carried);
    hold[i] = Math.max(carried, cash[i - 1]);
  }

  return { cash, hold };
}

/**
 * 상태표를 마지막 날부터 거꾸로 따라가며 거래 복원
 * - 종료 상태: hold > cash 일 때만 보유, 같으면 현금
 * - 현재 값이 "유지"로 설명되면 상태 그대로, 아니면 매도/매수 전이로 판정
 * @returns 시간순 거래 (BUY, SELL, BUY, ... 교대)
 */
export function reconstructTransactions(
  prices: readonly number[],
  table: DpTable,
  epsilon: number = DP_EPSILON,
): Transaction[] {
  const eps = resolveEpsilon(epsilon);
  const n = prices.length;
  if (n < 2) return [];

  const { cash, hold } = table;
  const transactions: Transaction[] = [];
  let holding = hold[n - 1] > cash[n - 1];

  for (let i = n - 1; i >= 1; i--) {
    const carried = hold[i - 1] * (prices[i] / prices[i - 1]);

    if (!holding) {
      if (approxEqual(cash[i], cash[i - 1], eps)) continue;
      if (approxEqual(cash[i], carried, eps)) {
        transactions.push({ dayIndex: i, action: 'SELL', price: prices[i] });
        holding = true;
      }
    } else {
      if (hold[i - 1] > 0 && approxEqual(hold[i], carried, eps)) continue;
      if (approxEqual(hold[i], cash[i - 1], eps)) {
        transactions.push({ dayIndex: i, action: 'BUY', price: prices[i] });
        holding = false;
      }
    }
  }

  return transactions.reverse();
}

export function simulateDpMulti(
  series: PriceSeries,
  params: SimulationParams,
  observer?: TradeObserver,
): SimulationRun {
  const { initialCapital } = resolveParams(params);
  resolveEpsilon(DP_EPSILON);
  if (series.length < 2) {
    log.debug({ err: new InsufficientDataError(series.length) }, 'Flat series');
    return { values: flatSeries(series, initialCapital), trades: [] };
  }

  const prices = series.map((p) => p.close);
  const table = tabulate(prices, initialCapital);
  const transactions = reconstructTransactions(prices, table);
  const byDay = new Map(transactions.map((t) => [t.dayIndex, t.action]));

  const position = new AllInPosition(initialCapital, observer);
  const values: ValuePoint[] = series.map((point, i) => {
    const action = byDay.get(i);
    if (action === 'BUY') position.buyAll(i, point);
    else if (action === 'SELL') position.sellAll(i, point);
    return { timestamp: point.timestamp, value: position.valueAt(point.close) };
  });

  // 마지막 날까지 보유 중이면 종가로 강제 청산 (가치는 동일)
  const lastIndex = series.length - 1;
  const last = series[lastIndex];
  if (position.isHolding && last !== undefined) {
    position.sellAll(lastIndex, last, 'FORCE_CLOSE');
    values[lastIndex] = { timestamp: last.timestamp, value: position.cash };
  }

  log.debug(
    { days: series.length, transactions: transactions.length, tabulated: Math.max(table.cash[lastIndex], table.hold[lastIndex]) },
    'Reconstructed trade path',
  );

  return { values, trades: position.getTrades() };
}

export const dpMultiStrategy: Strategy = {
  id: 'dp-multi',
  name: 'DP Multi Transaction (all-in)',
  simulate: simulateDpMulti,
};
