import pino from 'pino';
import { config } from './config.js';

/**
 * 루트 로거. 로그는 stderr 로, stdout 은 요약/거래 표 출력 전용
 * err 필드는 SimulationError 의 code 까지 직렬화
 */
export const logger = pino({
  name: config.log.name,
  level: config.log.level,
  base: { pid: process.pid },
  transport: {
    target: 'pino/file',
    options: { destination: 2 },
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** 모듈별 child 로거 (module 외 추가 바인딩 선택) */
export function createChildLogger(module: string, bindings: pino.Bindings = {}): pino.Logger {
  return logger.child({ ...bindings, module });
}
