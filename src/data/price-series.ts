import { z } from 'zod';
import { InvalidPriceSeriesError } from '../errors.js';
import type { PricePoint, PriceSeries } from '../types/index.js';

export const priceRecordSchema = z.object({
  date: z.union([z.string(), z.number(), z.date()]),
  close: z.number().finite().positive(),
});

export type PriceRecord = z.input<typeof priceRecordSchema>;

function toTimestamp(date: string | number | Date): number {
  if (date instanceof Date) return date.getTime();
  if (typeof date === 'number') return date;
  return Date.parse(date);
}

/**
 * 외부에서 받은 (날짜, 종가) 레코드를 시뮬레이터 입력으로 정규화
 * - 종가 > 0, 날짜 파싱 가능, 타임스탬프 strictly increasing
 * - 날짜 공백(휴장일 등)은 그대로 허용
 */
export function toPriceSeries(records: readonly PriceRecord[]): PriceSeries {
  const points: PricePoint[] = [];

  records.forEach((record, i) => {
    const parsed = priceRecordSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidPriceSeriesError(
        i,
        issue ? `${issue.path.join('.') || 'record'} ${issue.message}` : 'invalid record',
      );
    }

    const timestamp = toTimestamp(parsed.data.date);
    if (!Number.isFinite(timestamp)) {
      throw new InvalidPriceSeriesError(i, `unparseable date ${String(parsed.data.date)}`);
    }

    const prev = points[points.length - 1];
    if (prev !== undefined && timestamp <= prev.timestamp) {
      throw new InvalidPriceSeriesError(i, 'timestamps must be strictly increasing');
    }

    points.push({ timestamp, close: parsed.data.close });
  });

  return Object.freeze(points);
}
