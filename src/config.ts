import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 패키지 루트 .env 를 먼저 읽고, cwd 의 .env 가 있으면 덮어씀
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config({ override: true });

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

export type ExecutionMode = 'sequential' | 'parallel';

function envMode(key: string, fallback: ExecutionMode): ExecutionMode {
  const v = env(key, fallback).toLowerCase();
  return v === 'sequential' || v === 'parallel' ? v : fallback;
}

export const config = {
  capital: {
    /** 시뮬레이션 초기 자본 (통화 단위) */
    initial: envNum('INITIAL_CAPITAL', 10_000_000),
  },

  strategy: {
    smaWindow: envNum('SMA_WINDOW', 5),
  },

  dp: {
    /** 역추적 시 상태 전이 일치 판정 허용 오차 (상대값) */
    epsilon: envNum('DP_EPSILON', 1e-9),
  },

  driver: {
    mode: envMode('SIM_MODE', 'parallel'),
    concurrency: envNum('SIM_CONCURRENCY', 4),
  },

  data: {
    dir: env('DATA_DIR', './data'),
  },

  log: {
    /** 로그 레코드의 name 필드 */
    name: env('LOG_NAME', 'equity-sim'),
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
