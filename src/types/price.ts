export interface PricePoint {
  readonly timestamp: number;   // Unix ms
  readonly close: number;
}

/** 시간 오름차순 일별 종가. 로드 후 불변 */
export type PriceSeries = readonly PricePoint[];

export interface ValuePoint {
  readonly timestamp: number;
  readonly value: number;
}

/** 입력 PriceSeries 와 길이·타임스탬프가 1:1 로 정렬된 포트폴리오 가치 */
export type PortfolioValueSeries = readonly ValuePoint[];
