/**
 * Simple Moving Average: 최근 period 개 종가의 산술 평균
 *
 * 매 봉마다 윈도우를 다시 합산 (누적 합의 부동소수점 오차 방지).
 * 윈도우 값이 모두 같으면 평균 = 그 값 그대로 (종가 == SMA 동률 판정 보존)
 */
export class SMA {
  private readonly period: number;
  private readonly window: number[] = [];
  private current: number = NaN;

  constructor(period: number) {
    if (!Number.isInteger(period) || period < 1) {
      throw new Error('SMA period must be an integer >= 1');
    }
    this.period = period;
  }

  /** @returns 윈도우가 채워지기 전에는 NaN */
  update(value: number): number {
    this.window.push(value);
    if (this.window.length > this.period) {
      this.window.shift();
    }
    this.current = this.isReady ? average(this.window) : NaN;
    return this.current;
  }

  get value(): number {
    return this.current;
  }

  get isReady(): boolean { return this.window.length === this.period; }
}

function average(values: readonly number[]): number {
  const first = values[0] ?? NaN;
  let sum = 0;
  let uniform = true;
  for (const v of values) {
    sum += v;
    if (v !== first) uniform = false;
  }
  return uniform ? first : sum / values.length;
}

/** 전체 시리즈에 대한 trailing SMA (앞 period-1 개는 NaN) */
export function rollingSma(values: readonly number[], period: number): number[] {
  const sma = new SMA(period);
  return values.map((v) => sma.update(v));
}
