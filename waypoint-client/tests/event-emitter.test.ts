import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from '../src/EventEmitter.js';

interface TestEvents {
  ping: (value: number) => void;
  done: () => void;
}

class TestEmitter extends EventEmitter<TestEvents> {
  fire<K extends keyof TestEvents>(event: K, ...args: Parameters<TestEvents[K]>): void {
    this.emit(event, ...args);
  }
}

describe('EventEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should call every handler with the event arguments', () => {
    const emitter = new TestEmitter();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on('ping', first);
    emitter.on('ping', second);

    emitter.fire('ping', 7);

    expect(first).toHaveBeenCalledWith(7);
    expect(second).toHaveBeenCalledWith(7);
    expect(emitter.listenerCount('ping')).toBe(2);
  });

  it('should unsubscribe through the returned function and off()', () => {
    const emitter = new TestEmitter();
    const first = vi.fn();
    const second = vi.fn();
    const unsubscribe = emitter.on('ping', first);
    emitter.on('ping', second);

    unsubscribe();
    emitter.off('ping', second);
    emitter.fire('ping', 1);

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
    expect(emitter.listenerCount('ping')).toBe(0);
  });

  it('should call once handlers a single time', () => {
    const emitter = new TestEmitter();
    const handler = vi.fn();
    emitter.once('done', handler);

    emitter.fire('done');
    emitter.fire('done');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount('done')).toBe(0);
  });

  it('should keep calling handlers after one throws', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const emitter = new TestEmitter();
    const after = vi.fn();
    emitter.on('ping', () => {
      throw new Error('boom');
    });
    emitter.on('ping', after);

    emitter.fire('ping', 2);

    expect(after).toHaveBeenCalledWith(2);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('should drop every handler on removeAllListeners', () => {
    const emitter = new TestEmitter();
    const handler = vi.fn();
    emitter.on('ping', handler);
    emitter.once('done', handler);

    emitter.removeAllListeners();
    emitter.fire('ping', 1);
    emitter.fire('done');

    expect(handler).not.toHaveBeenCalled();
  });
});
