export type TradeAction = 'BUY' | 'SELL';

/** DP 역추적으로 얻은 거래 (내부용) */
export interface Transaction {
  readonly dayIndex: number;
  readonly action: TradeAction;
  readonly price: number;
}

export type TradeEventType = TradeAction | 'FORCE_CLOSE';

export interface TradeEvent {
  readonly type: TradeEventType;
  readonly timestamp: number;
  readonly dayIndex: number;
  readonly price: number;
  readonly shares: number;      // 이번 체결 수량
  readonly cash: number;        // 체결 후 현금
}

export interface InstrumentTradeEvent extends TradeEvent {
  readonly instrument: string;
}

export type TradeObserver = (event: TradeEvent) => void;
