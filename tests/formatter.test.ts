import { describe, it, expect } from 'vitest';
import { formatAmount, formatSummary, formatTrades } from '../src/report/formatter.js';

describe('formatter', () => {
  it('should abbreviate amounts', () => {
    expect(formatAmount(10_500_000)).toBe('10.50M');
    expect(formatAmount(1_500)).toBe('1.5K');
    expect(formatAmount(12.5)).toBe('12.50');
    expect(formatAmount(-2_000_000)).toBe('-2.00M');
  });

  it('should render one row per summary', () => {
    const text = formatSummary('DP SINGLE', [{
      instrument: 'AAA',
      initialCapital: 1000,
      finalValue: 2800,
      totalReturn: 180,
      maxDrawdown: 0,
      tradingDays: 5,
      tradeCount: 2,
    }]);

    const lines = text.split('\n');
    expect(lines).toContain('          DP SINGLE');
    expect(lines).toContain(
      '  AAA         ' + ' ' + '            2.8K' + ' ' + '  +180.00%' + ' ' + '    0.00%' + ' ' + '    5' + ' ' + '     2',
    );
  });

  it('should say so when there is nothing to show', () => {
    expect(formatSummary('EMPTY', []).split('\n')).toContain('  No results.');
    expect(formatTrades([])).toBe('No trades.');
  });

  it('should render trade rows with ISO dates', () => {
    const text = formatTrades([{
      instrument: 'AAA',
      type: 'BUY',
      timestamp: Date.UTC(2024, 0, 2),
      dayIndex: 1,
      price: 5,
      shares: 200,
      cash: 0,
    }]);
    expect(text.split('\n')[2]).toBe(
      '  AAA         ' + ' ' + '2024-01-02' + ' ' + 'BUY         ' + ' ' + '         200' + ' ' + '        5.00' + ' ' + '        0.00',
    );
  });
});
