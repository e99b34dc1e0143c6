import type { PortfolioValueSeries, SimulationRun, SimulationSummary } from '../types/index.js';
import type { SimulationBatch } from '../engine/simulation-driver.js';

export function buildSummary(
  instrument: string,
  run: SimulationRun,
  initialCapital: number,
): SimulationSummary {
  const last = run.values[run.values.length - 1];
  const finalValue = last?.value ?? initialCapital;

  return {
    instrument,
    initialCapital,
    finalValue,
    totalReturn: initialCapital > 0 ? ((finalValue - initialCapital) / initialCapital) * 100 : 0,
    maxDrawdown: calcMaxDrawdown(run.values),
    tradingDays: run.values.length,
    tradeCount: run.trades.length,
  };
}

/**
 * 배치 결과 요약: 총수익률 내림차순
 */
export function summarizeBatch(batch: SimulationBatch): SimulationSummary[] {
  const summaries: SimulationSummary[] = [];
  for (const [instrument, run] of batch.runs) {
    summaries.push(buildSummary(instrument, run, batch.params.initialCapital));
  }
  return summaries.sort((a, b) => b.totalReturn - a.totalReturn);
}

export function calcMaxDrawdown(values: PortfolioValueSeries): number {
  const first = values[0];
  if (first === undefined) return 0;
  let peak = first.value;
  let maxDd = 0;

  for (const point of values) {
    if (point.value > peak) peak = point.value;
    const dd = peak > 0 ? (peak - point.value) / peak : 0;
    if (dd > maxDd) maxDd = dd;
  }

  return maxDd * 100;
}
