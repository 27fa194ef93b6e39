import { describe, it, expect, vi } from 'vitest';

vi.mock('./logger.js', () => ({
  logger: {
    warning: vi.fn(),
    error: vi.fn(),
    blank: vi.fn(),
  },
}));

import { ShutdownManager } from './shutdown.js';
import { logger } from './logger.js';

describe('ShutdownManager', () => {
  it('should start with a live signal', () => {
    const manager = new ShutdownManager({ skipHandlers: true });

    expect(manager.signal.aborted).toBe(false);
    expect(manager.isInProgress()).toBe(false);
  });

  it('should abort the signal with the given reason', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });

    await manager.requestShutdown('SIGINT');

    expect(manager.signal.aborted).toBe(true);
    expect(manager.signal.reason).toBe('SIGINT');
    expect(manager.isInProgress()).toBe(true);
  });

  it('should run callbacks in reverse order exactly once', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const order: string[] = [];
    manager.onCleanup(() => {
      order.push('first');
    });
    manager.onCleanup(async () => {
      order.push('second');
    });

    await manager.requestShutdown();
    await manager.requestShutdown();

    expect(order).toEqual(['second', 'first']);
  });

  it('should keep running callbacks after one fails', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const after = vi.fn();
    manager.onCleanup(after);
    manager.onCleanup(() => {
      throw new Error('rm failed');
    });

    await manager.requestShutdown();

    expect(after).toHaveBeenCalledTimes(1);
    expect(logger.warning).toHaveBeenCalledWith('Cleanup error: rm failed');
  });

  it('should not run removed callbacks', async () => {
    const manager = new ShutdownManager({ skipHandlers: true });
    const callback = vi.fn();
    manager.onCleanup(callback);
    manager.removeCleanup(callback);

    await manager.requestShutdown();

    expect(callback).not.toHaveBeenCalled();
  });
});
