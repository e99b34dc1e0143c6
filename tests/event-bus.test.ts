import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../src/engine/event-bus.js';
import type { InstrumentTradeEvent } from '../src/types/index.js';

function event(type: InstrumentTradeEvent['type'], instrument: string): InstrumentTradeEvent {
  return { type, instrument, timestamp: 0, dayIndex: 0, price: 1, shares: 1, cash: 0 };
}

describe('EventBus', () => {
  it('should dispatch by type and to wildcard handlers', () => {
    const bus = new EventBus();
    const buys = vi.fn();
    const all = vi.fn();
    bus.on('BUY', buys);
    bus.on('*', all);

    bus.emit(event('BUY', 'AAA'));
    bus.emit(event('SELL', 'AAA'));

    expect(buys).toHaveBeenCalledTimes(1);
    expect(all).toHaveBeenCalledTimes(2);
  });

  it('should keep a log filterable by instrument', () => {
    const bus = new EventBus();
    bus.emit(event('BUY', 'AAA'));
    bus.emit(event('BUY', 'BBB'));
    bus.emit(event('SELL', 'AAA'));

    expect(bus.getLog()).toHaveLength(3);
    expect(bus.getLogFor('AAA').map((e) => e.type)).toEqual(['BUY', 'SELL']);
  });
});
