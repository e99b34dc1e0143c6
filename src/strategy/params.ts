import { z } from 'zod';
import { config } from '../config.js';
import { InvalidParameterError } from '../errors.js';
import type { SimulationParams } from '../types/index.js';

export const simulationParamsSchema = z.object({
  initialCapital: z.number().finite().positive(),
  smaWindow: z.number().int().positive(),
});

export const DEFAULT_PARAMS: SimulationParams = {
  initialCapital: config.capital.initial,
  smaWindow: config.strategy.smaWindow,
};

/**
 * 시뮬레이션 시작 전 파라미터 검증: 잘못된 값은 즉시 InvalidParameterError
 */
export function resolveParams(params?: Partial<SimulationParams>): SimulationParams {
  const merged = { ...DEFAULT_PARAMS, ...params };
  const parsed = simulationParamsSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join('.') : 'params';
    throw new InvalidParameterError(name, issue ? issue.message : 'invalid value');
  }
  return parsed.data;
}

export const dpEpsilonSchema = z.number().finite().positive();

/** DP 역추적 허용 오차 검증 (NaN, 0, 음수는 InvalidParameterError) */
export function resolveEpsilon(value: number): number {
  const parsed = dpEpsilonSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidParameterError('DP_EPSILON', issue ? issue.message : 'invalid value');
  }
  return parsed.data;
}

/** 길이 n 의 초기 자본 평탄 시리즈 */
export function flatSeries(
  timestamps: readonly { timestamp: number }[],
  initialCapital: number,
): { timestamp: number; value: number }[] {
  return timestamps.map((p) => ({ timestamp: p.timestamp, value: initialCapital }));
}
