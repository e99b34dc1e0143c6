import { InvalidParameterError } from '../errors.js';
import { dpMultiStrategy } from './dp-multi.js';
import { dpSingleStrategy } from './dp-single.js';
import { smaTrendStrategy } from './sma-trend.js';
import type { Strategy, StrategyId } from './strategy.js';

export const STRATEGIES: Readonly<Record<StrategyId, Strategy>> = {
  'sma-trend': smaTrendStrategy,
  'dp-single': dpSingleStrategy,
  'dp-multi': dpMultiStrategy,
};

export function isStrategyId(value: string): value is StrategyId {
  return Object.hasOwn(STRATEGIES, value);
}

export function getStrategy(id: string): Strategy {
  if (!isStrategyId(id)) {
    throw new InvalidParameterError(
      'strategy',
      `unknown "${id}" (available: ${Object.keys(STRATEGIES).join(', ')})`,
    );
  }
  return STRATEGIES[id];
}
