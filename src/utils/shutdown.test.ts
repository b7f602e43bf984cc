import { describe, expect, it, vi } from 'vitest';
import { GracefulShutdown } from './shutdown.js';

describe('GracefulShutdown', () => {
  it('runs handlers by descending priority and then exits', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdown({ installSignalHandlers: false, exit });
    const order: string[] = [];
    shutdown.registerHandler('flush-logs', () => {
      order.push('flush-logs');
    }, 10);
    shutdown.registerHandler('cancel-runs', async () => {
      order.push('cancel-runs');
    }, 100);

    await shutdown.shutdown('test', 3);

    expect(order).toEqual(['cancel-runs', 'flush-logs']);
    expect(exit).toHaveBeenCalledWith(3);
  });

  it('keeps going when a handler fails or hangs', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdown({ installSignalHandlers: false, exit, handlerTimeoutMs: 10 });
    const last = vi.fn();
    shutdown.registerHandler('broken', () => {
      throw new Error('cannot close');
    }, 3);
    shutdown.registerHandler('stuck', () => new Promise<void>(() => undefined), 2);
    shutdown.registerHandler('last', last, 1);

    await shutdown.shutdown();

    expect(last).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(130);
  });

  it('shuts down once however often it is asked', async () => {
    const exit = vi.fn();
    const shutdown = new GracefulShutdown({ installSignalHandlers: false, exit });

    await Promise.all([shutdown.shutdown('first'), shutdown.shutdown('second')]);

    expect(exit).toHaveBeenCalledTimes(1);
  });
});
