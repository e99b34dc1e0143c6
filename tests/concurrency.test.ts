import { describe, it, expect } from 'vitest';
import { limitConcurrency } from '../src/engine/concurrency.js';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('limitConcurrency', () => {
  it('should never run more than the limit at once', async () => {
    const limit = limitConcurrency(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) => limit(async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return n * 10;
      })),
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
  });

  it('should release the slot when a task throws', async () => {
    const limit = limitConcurrency(1);
    await expect(limit(() => { throw new Error('fail'); })).rejects.toThrow('fail');
    await expect(limit(() => 'ok')).resolves.toBe('ok');
  });

  it('should reject invalid limits', () => {
    expect(() => limitConcurrency(0)).toThrow('concurrency must be an integer >= 1');
  });
});
