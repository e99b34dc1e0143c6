export type SimulationErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'NO_PROFITABLE_TRANSACTION'
  | 'INVALID_PARAMETER'
  | 'INVALID_PRICE_SERIES';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * 가격 포인트 2개 미만: 시뮬레이터는 던지지 않고 초기 자본 평탄 시리즈로 대체
 */
export class InsufficientDataError extends SimulationError {
  readonly length: number;

  constructor(length: number) {
    super('INSUFFICIENT_DATA', `Need at least 2 price points, got ${length}`);
    this.length = length;
  }
}

/** 정보성: 수익이 나는 매수/매도 쌍이 없음 (DP 단일 거래) */
export class NoProfitableTransactionError extends SimulationError {
  constructor() {
    super('NO_PROFITABLE_TRANSACTION', 'No buy/sell pair with positive profit');
  }
}

export class InvalidParameterError extends SimulationError {
  readonly param: string;

  constructor(param: string, message: string) {
    super('INVALID_PARAMETER', `${param}: ${message}`);
    this.param = param;
  }
}

export class InvalidPriceSeriesError extends SimulationError {
  readonly index: number;

  constructor(index: number, message: string) {
    super('INVALID_PRICE_SERIES', `Point ${index}: ${message}`);
    this.index = index;
  }
}
