import type { PortfolioValueSeries } from './price.js';
import type { TradeEvent } from './trade.js';

export interface SimulationParams {
  readonly initialCapital: number;
  readonly smaWindow: number;       // sma-trend 전용
}

export interface SimulationRun {
  readonly values: PortfolioValueSeries;
  readonly trades: readonly TradeEvent[];
}

export interface SimulationSummary {
  readonly instrument: string;
  readonly initialCapital: number;
  readonly finalValue: number;
  readonly totalReturn: number;     // %
  readonly maxDrawdown: number;     // % (양수)
  readonly tradingDays: number;
  readonly tradeCount: number;
}
