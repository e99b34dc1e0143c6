export type {
  PricePoint,
  PriceSeries,
  ValuePoint,
  PortfolioValueSeries,
} from './price.js';
export type {
  TradeAction,
  Transaction,
  TradeEventType,
  TradeEvent,
  InstrumentTradeEvent,
  TradeObserver,
} from './trade.js';
export type {
  SimulationParams,
  SimulationRun,
  SimulationSummary,
} from './simulation.js';
