import type { InstrumentTradeEvent, SimulationSummary } from '../types/index.js';

/**
 * 콘솔 테이블 출력 (외부 의존성 없음)
 */
export function formatSummary(title: string, summaries: readonly SimulationSummary[]): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════════════════════════════════');
  lines.push(`          ${title}`);
  lines.push('═══════════════════════════════════════════════════════════════════════');
  lines.push('');

  if (summaries.length === 0) {
    lines.push('  No results.');
    lines.push('');
    return lines.join('\n');
  }

  lines.push('  Instrument   Final Value       Return     Max DD    Days  Trades');
  lines.push('  ──────────── ──────────────── ────────── ───────── ───── ──────');

  for (const s of summaries) {
    const id = s.instrument.padEnd(12);
    const value = formatAmount(s.finalValue).padStart(16);
    const ret = formatPct(s.totalReturn).padStart(10);
    const dd = `${s.maxDrawdown.toFixed(2)}%`.padStart(9);
    const days = String(s.tradingDays).padStart(5);
    const trades = String(s.tradeCount).padStart(6);
    lines.push(`  ${id} ${value} ${ret} ${dd} ${days} ${trades}`);
  }

  lines.push('');
  return lines.join('\n');
}

export function formatAmount(value: number): string {
  const sign = value >= 0 ? '' : '-';
  const abs = Math.abs(value);
  if (abs >= 1_000_000) {
    return `${sign}${(abs / 1_000_000).toFixed(2)}M`;
  }
  if (abs >= 1_000) {
    return `${sign}${(abs / 1_000).toFixed(1)}K`;
  }
  return `${sign}${abs.toFixed(2)}`;
}

function formatPct(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

/**
 * 체결 목록 출력
 */
export function formatTrades(events: readonly InstrumentTradeEvent[]): string {
  if (events.length === 0) return 'No trades.';

  const lines: string[] = [];
  lines.push('  Instrument   Date        Action       Shares        Price          Cash');
  lines.push('  ──────────── ────────── ──────────── ──────────── ──────────── ────────────');

  for (const e of events) {
    const id = e.instrument.padEnd(12);
    const date = formatDate(e.timestamp);
    const action = e.type.padEnd(12);
    const shares = String(e.shares).padStart(12);
    const price = e.price.toFixed(2).padStart(12);
    const cash = e.cash.toFixed(2).padStart(12);
    lines.push(`  ${id} ${date} ${action} ${shares} ${price} ${cash}`);
  }

  return lines.join('\n');
}

function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}
