/**
 * 동시 실행 개수 제한 (p-limit 방식)
 * 끝난 작업의 슬롯은 대기 중인 다음 작업에 바로 넘김
 */
export function limitConcurrency(concurrency: number) {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error('concurrency must be an integer >= 1');
  }
  let active = 0;
  const queue: Array<() => void> = [];

  const release = (): void => {
    const resume = queue.shift();
    if (resume) resume();
    else active--;
  };

  return async function run<T>(fn: () => T | Promise<T>): Promise<T> {
    if (active >= concurrency) {
      await new Promise<void>((resolve) => queue.push(resolve));
    } else {
      active++;
    }
    try {
      // 이벤트 루프에 양보 후 실행
      await new Promise<void>((resolve) => setImmediate(resolve));
      return await fn();
    } finally {
      release();
    }
  };
}
