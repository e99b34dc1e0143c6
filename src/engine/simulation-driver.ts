import type { Logger } from 'pino';
import type {
  PortfolioValueSeries,
  PriceSeries,
  SimulationParams,
  SimulationRun,
  TradeObserver,
} from '../types/index.js';
import { config, type ExecutionMode } from '../config.js';
import { InvalidParameterError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { resolveParams } from '../strategy/params.js';
import type { Strategy } from '../strategy/strategy.js';
import { limitConcurrency } from './concurrency.js';
import type { EventBus } from './event-bus.js';


export interface DriverOptions {
  readonly mode: ExecutionMode;
  readonly concurrency: number;
  /** 체결 이벤트를 종목 코드와 함께 발행 */
  readonly bus?: EventBus;
}

const DEFAULT_OPTIONS: DriverOptions = {
  mode: config.driver.mode,
  concurrency: config.driver.concurrency,
};

export interface SimulationBatch {
  readonly strategy: Strategy['id'];
  readonly params: SimulationParams;
  /** 종목 → 포트폴리오 가치 (입력 순서 유지) */
  readonly results: Map<string, PortfolioValueSeries>;
  readonly runs: Map<string, SimulationRun>;
  readonly failures: Map<string, Error>;
}

/**
 * 종목별 독립 시뮬레이션: 공유 상태 없음
 * 한 종목 실패는 failures 에 기록하고 나머지는 계속 진행
 */
export async function runSimulations(
  instruments: ReadonlyMap<string, PriceSeries>,
  strategy: Strategy,
  params?: Partial<SimulationParams>,
  options?: Partial<DriverOptions>,
): Promise<SimulationBatch> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  // 파라미터 오류는 시뮬레이션 시작 전에 즉시 실패
  const resolved = resolveParams(params);
  if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
    throw new InvalidParameterError('concurrency', 'must be an integer >= 1');
  }

  const log = createChildLogger('driver', { strategy: strategy.id });
  const entries = [...instruments.entries()];
  const limit = limitConcurrency(opts.mode === 'sequential' ? 1 : opts.concurrency);

  log.info(
    { instruments: entries.length, mode: opts.mode, concurrency: opts.concurrency },
    'Starting simulations',
  );

  const settled = await Promise.allSettled(
    entries.map(([instrument, series]) =>
      limit(() => runOne(instrument, series, strategy, resolved, log, opts.bus)),
    ),
  );

  const results = new Map<string, PortfolioValueSeries>();
  const runs = new Map<string, SimulationRun>();
  const failures = new Map<string, Error>();

  settled.forEach((outcome, i) => {
    const entry = entries[i];
    if (entry === undefined) return;
    const [instrument] = entry;
    if (outcome.status === 'fulfilled') {
      runs.set(instrument, outcome.value);
      results.set(instrument, outcome.value.values);
    } else {
      const err = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      failures.set(instrument, err);
      log.error({ err, instrument }, 'Simulation failed');
    }
  });

  log.info(
    { completed: results.size, failed: failures.size },
    'Simulations finished',
  );

  return { strategy: strategy.id, params: resolved, results, runs, failures };
}

function runOne(
  instrument: string,
  series: PriceSeries,
  strategy: Strategy,
  params: SimulationParams,
  log: Logger,
  bus?: EventBus,
): SimulationRun {
  const observer: TradeObserver | undefined = bus
    ? (event) => bus.emit({ ...event, instrument })
    : undefined;

  const run = strategy.simulate(series, params, observer);
  const last = run.values[run.values.length - 1];
  log.debug(
    { instrument, days: series.length, trades: run.trades.length, finalValue: last?.value },
    'Simulation done',
  );
  return run;
}
