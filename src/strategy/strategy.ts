import type { PriceSeries, SimulationParams, SimulationRun, TradeObserver } from '../types/index.js';

export type StrategyId = 'sma-trend' | 'dp-single' | 'dp-multi';

/**
 * 공통 전략 인터페이스: PriceSeries + 파라미터 → 포트폴리오 가치 시리즈
 * 구현체는 상태 없는 순수 함수 (같은 입력 → 같은 출력)
 */
export interface Strategy {
  readonly id: StrategyId;
  readonly name: string;
  simulate(series: PriceSeries, params: SimulationParams, observer?: TradeObserver): SimulationRun;
}
