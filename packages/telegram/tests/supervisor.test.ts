import { describe, it, expect, vi } from 'vitest';
import { isConflictError, retryDelayMs, Supervisor } from '../src/services/supervisor.js';

const CONFLICT = new Error(
  'Call to getUpdates failed! (409: Conflict: terminated by other getUpdates request)'
);

describe('supervisor', () => {
  it('recognises Telegram conflict errors', () => {
    expect(isConflictError(CONFLICT)).toBe(true);
    expect(isConflictError(new Error('ETIMEDOUT'))).toBe(false);
    expect(isConflictError('Conflict')).toBe(true);
  });

  it('backs off longer for each conflict', () => {
    expect(retryDelayMs(CONFLICT, 1)).toBe(20000);
    expect(retryDelayMs(CONFLICT, 3)).toBe(60000);
    expect(retryDelayMs(new Error('network down'), 3)).toBe(10000);
  });

  it('restarts polling after conflicts until it stops cleanly', async () => {
    const delays: number[] = [];
    let supervisor: Supervisor | null = null;
    let calls = 0;

    const runOnce = vi.fn(async () => {
      calls++;
      if (calls < 3) throw CONFLICT;
      supervisor?.stop();
    });
    const onRestart = vi.fn();
    supervisor = new Supervisor(runOnce, {
      onRestart,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    await supervisor.run();

    expect(runOnce).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([20000, 40000]);
    expect(onRestart).toHaveBeenCalledTimes(2);
    expect(onRestart).toHaveBeenLastCalledWith(CONFLICT, 2);
  });

  it('waits before a new round after five failed attempts', async () => {
    const delays: number[] = [];
    const runOnce = vi.fn(async () => {
      throw new Error('network down');
    });
    const supervisor: Supervisor = new Supervisor(runOnce, {
      sleep: async (ms) => {
        delays.push(ms);
        if (delays.length === 6) supervisor.stop();
      },
    });

    await supervisor.run();

    expect(runOnce).toHaveBeenCalledTimes(5);
    expect(delays).toEqual([10000, 10000, 10000, 10000, 10000, 30000]);
  });

  it('waits the startup delay before each round', async () => {
    const delays: number[] = [];
    const supervisor: Supervisor = new Supervisor(
      async () => {
        supervisor.stop();
      },
      {
        startupDelayMs: 5000,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }
    );

    await supervisor.run();

    expect(delays).toEqual([5000]);
    expect(supervisor.isStopping).toBe(true);
  });
});
