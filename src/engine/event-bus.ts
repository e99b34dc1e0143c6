import type { InstrumentTradeEvent, TradeEventType } from '../types/index.js';

type EventHandler = (event: InstrumentTradeEvent) => void;

/**
 * 타입드 이벤트 버스: 종목별 체결 이벤트 수집, 로그 보관으로 리플레이 가능
 */
export class EventBus {
  private readonly handlers: Map<TradeEventType | '*', EventHandler[]> = new Map();
  private readonly log: InstrumentTradeEvent[] = [];

  on(type: TradeEventType | '*', handler: EventHandler): void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
  }

  emit(event: InstrumentTradeEvent): void {
    this.log.push(event);
    for (const key of [event.type, '*'] as const) {
      const handlers = this.handlers.get(key);
      if (handlers) {
        for (const h of handlers) {
          h(event);
        }
      }
    }
  }

  getLog(): readonly InstrumentTradeEvent[] {
    return this.log;
  }

  getLogFor(instrument: string): InstrumentTradeEvent[] {
    return this.log.filter((e) => e.instrument === instrument);
  }
}
