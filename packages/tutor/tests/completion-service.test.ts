import { describe, it, expect, vi } from 'vitest';
import { CompletionError, CompletionTimeoutError } from '@tutorbot/shared';
import {
  CompletionRunner,
  OpenRouterCompletionService,
  type CompletionService,
} from '../src/services/completion-service.js';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('CompletionRunner', () => {
  it('returns the service response and passes an abort signal', async () => {
    const complete = vi.fn(async (_request: unknown, signal?: AbortSignal) => {
      expect(signal?.aborted).toBe(false);
      return 'Bonjour!';
    });
    const runner = new CompletionRunner({ complete });

    await expect(runner.run({ promptText: 'translate hello' })).resolves.toBe('Bonjour!');
    expect(complete).toHaveBeenCalledWith({ promptText: 'translate hello' }, expect.any(AbortSignal));
  });

  it('never runs more requests than the concurrency limit', async () => {
    let current = 0;
    let peak = 0;
    const service: CompletionService = {
      async complete() {
        current++;
        peak = Math.max(peak, current);
        await sleep(10);
        current--;
        return 'ok';
      },
    };
    const runner = new CompletionRunner(service, { concurrency: 2 });

    const runs = Array.from({ length: 5 }, () => runner.run({ promptText: 'q' }));
    expect(runner.inFlight).toBe(2);
    expect(runner.queued).toBe(3);

    await expect(Promise.all(runs)).resolves.toEqual(['ok', 'ok', 'ok', 'ok', 'ok']);
    expect(peak).toBe(2);
    expect(runner.inFlight).toBe(0);
  });

  it('times out and aborts a slow request', async () => {
    let seenSignal: AbortSignal | undefined;
    const service: CompletionService = {
      complete(_request, signal) {
        seenSignal = signal;
        return new Promise((_, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      },
    };
    const runner = new CompletionRunner(service, { timeoutMs: 20 });

    const error = await runner.run({ promptText: 'q' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CompletionTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 20 });
    expect(seenSignal?.aborted).toBe(true);
  });

  it('counts time spent waiting for a slot against the timeout', async () => {
    const complete = vi.fn(async () => {
      await sleep(100);
      return 'slow';
    });
    const runner = new CompletionRunner({ complete }, { concurrency: 1, timeoutMs: 30 });

    const results = await Promise.allSettled([
      runner.run({ promptText: 'first' }),
      runner.run({ promptText: 'second' }),
    ]);

    for (const result of results) {
      expect(result.status).toBe('rejected');
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(CompletionTimeoutError);
      }
    }

    await sleep(120);
    expect(complete).toHaveBeenCalledTimes(1);
    expect(runner.inFlight).toBe(0);
    expect(runner.queued).toBe(0);
  });

  it('passes service errors through', async () => {
    const runner = new CompletionRunner({
      complete: async () => {
        throw new CompletionError('No response generated');
      },
    });

    await expect(runner.run({ promptText: 'q' })).rejects.toThrow('No response generated');
  });
});

describe('OpenRouterCompletionService', () => {
  it('requires an API key', () => {
    expect(
      () =>
        new OpenRouterCompletionService({
          apiKey: '',
          baseURL: 'https://openrouter.ai/api/v1',
          model: 'test-model',
        })
    ).toThrow(CompletionError);
  });

  it('reports the configured model', () => {
    const service = new OpenRouterCompletionService({
      apiKey: 'test-secret',
      baseURL: 'https://openrouter.ai/api/v1',
      model: 'test-model',
    });

    expect(service.getModel()).toBe('test-model');
  });
});
