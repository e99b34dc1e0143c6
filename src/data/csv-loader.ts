import { readFileSync, readdirSync } from 'node:fs';
import path from 'node:path';
import type { PriceSeries } from '../types/index.js';
import { createChildLogger } from '../logger.js';
import { toPriceSeries, type PriceRecord } from './price-series.js';

const log = createChildLogger('csv-loader');

export interface CsvLoaderOptions {
  readonly dateCol?: string;
  readonly closeCol?: string;
}

const DEFAULTS: Required<CsvLoaderOptions> = {
  dateCol: 'Date',
  closeCol: 'Close',
};

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

/** 일봉 날짜: ISO 등 Date.parse 형식, 또는 YYYYMMDD. 그 외 숫자열은 거부 */
function parseDate(value: string, lineNum: number): number {
  if (/^\d+$/.test(value)) {
    const m = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
    if (m) {
      const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
      const ms = Date.UTC(year, month - 1, day);
      const d = new Date(ms);
      // 20240230 처럼 넘치는 날짜 거부
      if (d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day) {
        return ms;
      }
    }
    throw new Error(`Line ${lineNum}: invalid date "${value}"`);
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new Error(`Line ${lineNum}: invalid date "${value}"`);
  }
  return ms;
}

/**
 * 종가 CSV 한 파일 로드 (헤더 + Date, Close 컬럼)
 * 빈 종가(상장 전/정지일)는 건너뜀
 */
export function loadCsv(filePath: string, options?: CsvLoaderOptions): PriceSeries {
  const opts = { ...DEFAULTS, ...options };
  const raw = readFileSync(filePath, 'utf-8');
  const lines = raw.split(/\r?\n/).filter((l) => l.trim().length > 0);

  if (lines.length < 1) {
    throw new Error('CSV must have a header row');
  }

  const header = parseCsvLine(lines[0] ?? '');
  const colIndex = (name: string): number => {
    const idx = header.indexOf(name);
    if (idx === -1) {
      throw new Error(`Column "${name}" not found. Available: ${header.join(', ')}`);
    }
    return idx;
  };

  const di = colIndex(opts.dateCol);
  const ci = colIndex(opts.closeCol);

  const records: { date: number; close: number }[] = [];

  for (let i = 1; i < lines.length; i++) {
    const fields = parseCsvLine(lines[i] ?? '');
    const closeField = fields[ci] ?? '';
    if (closeField === '') continue;

    const close = Number(closeField);
    if (!Number.isFinite(close) || close <= 0) {
      throw new Error(`Line ${i + 1}: invalid close "${closeField}"`);
    }
    records.push({ date: parseDate(fields[di] ?? '', i + 1), close });
  }

  // 시간순 정렬
  records.sort((a, b) => a.date - b.date);

  // 중복 날짜 확인
  for (let i = 1; i < records.length; i++) {
    const cur = records[i];
    const prev = records[i - 1];
    if (cur !== undefined && prev !== undefined && cur.date === prev.date) {
      throw new Error(`Duplicate date: ${new Date(cur.date).toISOString()}`);
    }
  }

  return toPriceSeries(records satisfies PriceRecord[]);
}

/**
 * 폴더 내 모든 *.csv 로드: 종목 코드 = 파일명 (확장자 제외)
 * 로드 실패 파일은 로그 남기고 건너뜀
 */
export function loadDataFolder(
  dir: string,
  options?: CsvLoaderOptions,
): Map<string, PriceSeries> {
  const result = new Map<string, PriceSeries>();
  const files = readdirSync(dir)
    .filter((f) => f.toLowerCase().endsWith('.csv'))
    .sort();

  for (const file of files) {
    const instrument = path.basename(file, path.extname(file));
    const filePath = path.join(dir, file);
    try {
      const series = loadCsv(filePath, options);
      result.set(instrument, series);
      log.info({ instrument, records: series.length }, 'Loaded price data');
    } catch (err) {
      log.error({ err, file: filePath }, 'Failed to load price data, skipping');
    }
  }

  return result;
}
