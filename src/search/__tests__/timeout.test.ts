import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../timeout.js';
import { SearchUnavailableError } from '../errors.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('возвращает результат, если задача успела', async () => {
    await expect(withTimeout(async () => 42, 100, 'Test')).resolves.toBe(42);
  });

  it('пробрасывает исходную ошибку задачи', async () => {
    await expect(withTimeout(async () => { throw new Error('boom'); }, 100, 'Test')).rejects.toThrow('boom');
  });

  it('отклоняет по истечении времени', async () => {
    vi.useFakeTimers();

    const pending = withTimeout(() => new Promise<number>(() => {}), 100, 'Test').catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(100);

    const error = await pending;
    expect(error).toBeInstanceOf(SearchUnavailableError);
    expect(error).toMatchObject({ message: 'Test timed out after 100ms' });
  });

  it('по таймауту отменяет сигнал задачи с той же ошибкой', async () => {
    vi.useFakeTimers();
    const captured: { signal?: AbortSignal } = {};

    const pending = withTimeout((signal) => {
      captured.signal = signal;
      return new Promise<number>(() => {});
    }, 100, 'Test').catch((e: unknown) => e);

    expect(captured.signal?.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(100);

    const error = await pending;
    expect(captured.signal?.aborted).toBe(true);
    expect(captured.signal?.reason).toBe(error);
  });

  it('снимает таймер после завершения задачи', async () => {
    vi.useFakeTimers();

    await withTimeout(async () => 'ok', 100, 'Test');

    expect(vi.getTimerCount()).toBe(0);
  });
});
