import type { PricePoint, TradeEvent, TradeEventType, TradeObserver } from '../types/index.js';

/**
 * 전액 매수 / 전량 매도 포지션
 * 정수 주식만 허용: 매수 수량 = floor(cash / price), 나머지는 현금으로 남음
 */
export class AllInPosition {
  private cashBalance: number;
  private shareCount: number = 0;
  private readonly trades: TradeEvent[] = [];
  private readonly observer?: TradeObserver;

  constructor(initialCapital: number, observer?: TradeObserver) {
    this.cashBalance = initialCapital;
    this.observer = observer;
  }

  get cash(): number {
    return this.cashBalance;
  }

  get shares(): number {
    return this.shareCount;
  }

  get isHolding(): boolean {
    return this.shareCount > 0;
  }

  /** @returns 매수한 주식 수 (현금 < 가격이면 0, 이벤트 없음) */
  buyAll(dayIndex: number, point: PricePoint): number {
    if (this.shareCount > 0) {
      throw new Error('Already holding: all-in position cannot add shares');
    }
    const qty = Math.floor(this.cashBalance / point.close);
    if (qty === 0) return 0;

    this.cashBalance -= qty * point.close;
    this.shareCount = qty;
    this.record('BUY', dayIndex, point, qty);
    return qty;
  }

  /** @returns 매도한 주식 수 */
  sellAll(dayIndex: number, point: PricePoint, type: TradeEventType = 'SELL'): number {
    const qty = this.shareCount;
    if (qty === 0) return 0;

    this.cashBalance += qty * point.close;
    this.shareCount = 0;
    this.record(type, dayIndex, point, qty);
    return qty;
  }

  valueAt(price: number): number {
    return this.cashBalance + this.shareCount * price;
  }

  getTrades(): readonly TradeEvent[] {
    return this.trades;
  }

  private record(type: TradeEventType, dayIndex: number, point: PricePoint, shares: number): void {
    const event: TradeEvent = {
      type,
      timestamp: point.timestamp,
      dayIndex,
      price: point.close,
      shares,
      cash: this.cashBalance,
    };
    this.trades.push(event);
    this.observer?.(event);
  }
}
