export * from './types/index.js';
export * from './errors.js';
export { toPriceSeries, priceRecordSchema, type PriceRecord } from './data/price-series.js';
export { loadCsv, loadDataFolder, type CsvLoaderOptions } from './data/csv-loader.js';
export { SMA, rollingSma } from './indicators/sma.js';
export { AllInPosition } from './engine/all-in-position.js';
export { EventBus } from './engine/event-bus.js';
export {
  runSimulations,
  type DriverOptions,
  type SimulationBatch,
} from './engine/simulation-driver.js';
export type { Strategy, StrategyId } from './strategy/strategy.js';
export { resolveParams, DEFAULT_PARAMS } from './strategy/params.js';
export { simulateSmaTrend, smaTrendStrategy } from './strategy/sma-trend.js';
export { simulateDpSingle, findBestTrade, dpSingleStrategy, type BestTrade } from './strategy/dp-single.js';
export {
  simulateDpMulti,
  tabulate,
  reconstructTransactions,
  dpMultiStrategy,
  DP_EPSILON,
  type DpTable,
} from './strategy/dp-multi.js';
export { STRATEGIES, getStrategy, isStrategyId } from './strategy/registry.js';
export { buildSummary, summarizeBatch, calcMaxDrawdown } from './report/metrics.js';
export { formatSummary, formatTrades, formatAmount } from './report/formatter.js';
export type { ExecutionMode } from './config.js';
