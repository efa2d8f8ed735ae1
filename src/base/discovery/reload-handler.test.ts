/**
 * Reload handler tests
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { ReloadHandler } from './reload-handler.js';
import { setLogSink } from '../utils/logger.js';
import { resetDebugConfig } from '../utils/debug.js';

describe('ReloadHandler', () => {
  const handlers: ReloadHandler[] = [];

  function track(handler: ReloadHandler): ReloadHandler {
    handlers.push(handler);
    return handler;
  }

  afterEach(() => {
    for (const handler of handlers.splice(0)) handler.stop();
    setLogSink();
  });

  it('should run the callback on SIGHUP while started', async () => {
    let calls = 0;
    let notify: () => void = () => undefined;
    const reloaded = new Promise<void>((resolve) => {
      notify = resolve;
    });
    const handler = track(
      new ReloadHandler(() => {
        calls++;
        notify();
      })
    );

    handler.start();
    process.emit('SIGHUP', 'SIGHUP');
    await reloaded;

    expect(calls).toBe(1);
  });

  it('should ignore reloads when not started', async () => {
    const saved = process.env.CAPREG_DEBUG_DISCOVERY;
    process.env.CAPREG_DEBUG_DISCOVERY = '1';
    resetDebugConfig();
    const lines: string[] = [];
    setLogSink({ write: (_level, line) => lines.push(line) });
    let calls = 0;
    const handler = track(new ReloadHandler(() => void calls++));

    try {
      await handler.simulateReload();
    } finally {
      if (saved === undefined) delete process.env.CAPREG_DEBUG_DISCOVERY;
      else process.env.CAPREG_DEBUG_DISCOVERY = saved;
      resetDebugConfig();
    }

    expect(calls).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('Reload:debug - Reload ignored: handler not started')).toBe(true);
  });

  it('should treat repeated start and stop as no-ops', async () => {
    let calls = 0;
    const handler = track(new ReloadHandler(() => void calls++));
    const before = process.listenerCount('SIGHUP');

    handler.start();
    handler.start();
    expect(process.listenerCount('SIGHUP')).toBe(before + 1);
    expect(handler.isRunning).toBe(true);

    await handler.simulateReload();
    handler.stop();
    handler.stop();

    expect(process.listenerCount('SIGHUP')).toBe(before);
    expect(handler.isRunning).toBe(false);
    await handler.simulateReload();
    expect(calls).toBe(1);
  });

  it('should abort the signal on stop and renew it on restart', () => {
    const handler = track(new ReloadHandler());

    handler.start();
    const first = handler.signal;
    handler.stop();
    expect(first.aborted).toBe(true);

    handler.start();
    expect(handler.signal.aborted).toBe(false);
  });

  it('should run reloads one at a time', async () => {
    const events: string[] = [];
    let run = 0;
    const handler = track(
      new ReloadHandler(async () => {
        const id = ++run;
        events.push(`start-${id}`);
        await new Promise<void>((resolve) => setImmediate(resolve));
        events.push(`end-${id}`);
      })
    );

    handler.start();
    await Promise.all([handler.simulateReload(), handler.simulateReload()]);

    expect(events).toEqual(['start-1', 'end-1', 'start-2', 'end-2']);
  });

  it('should log callback failures instead of throwing', async () => {
    const lines: string[] = [];
    setLogSink({ write: (_level, line) => lines.push(line) });
    const handler = track(
      new ReloadHandler(() => {
        throw new Error('disk unavailable');
      })
    );

    handler.start();
    await expect(handler.simulateReload()).resolves.toBeUndefined();
    expect(lines.some((line) => line.endsWith('Reload:error - Reload failed [error="disk unavailable"]'))).toBe(
      true
    );
  });
});
