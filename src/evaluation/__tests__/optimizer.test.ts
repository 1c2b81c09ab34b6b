import { describe, it, expect, vi } from 'vitest';
import { optimize } from '../optimizer.js';
import type { ParamValues } from '../optimizer.js';
import type { EvaluationReporter } from '../progress.js';

const RANGES = { content: [0, 3], title: [1, 2] } as const;

// Максимум в content = 2, title = 1.5.
function objective(params: ParamValues): number {
  return -((params['content']! - 2) ** 2) - ((params['title']! - 1.5) ** 2);
}

function fakeReporter(): EvaluationReporter {
  return {
    onQueryComplete: vi.fn(),
    onQueryFailed: vi.fn(),
    onTrialComplete: vi.fn(),
    onTrialFailed: vi.fn(),
  };
}

describe('optimize', () => {
  it('одинаковый seed даёт одинаковый результат', async () => {
    const first = await optimize(RANGES, objective, { iterations: 10, seed: 42 });
    const second = await optimize(RANGES, objective, { iterations: 10, seed: 42 });

    expect(second).toEqual(first);
    expect(first.seed).toBe(42);
  });

  it('разные seed дают разные выборки', async () => {
    const first = await optimize(RANGES, objective, { iterations: 3, seed: 1 });
    const second = await optimize(RANGES, objective, { iterations: 3, seed: 2 });

    expect(second.trials[0]!.params).not.toEqual(first.trials[0]!.params);
  });

  it('параметры лежат в [min, max)', async () => {
    const result = await optimize(RANGES, objective, { iterations: 50, seed: 7 });

    for (const { params } of result.trials) {
      expect(params['content']).toBeGreaterThanOrEqual(0);
      expect(params['content']).toBeLessThan(3);
      expect(params['title']).toBeGreaterThanOrEqual(1);
      expect(params['title']).toBeLessThan(2);
    }
  });

  it('лучший результат — максимум по попыткам', async () => {
    const result = await optimize(RANGES, objective, { iterations: 20, seed: 3 });
    const maxScore = Math.max(...result.trials.map((t) => t.score));

    expect(result.bestScore).toBe(maxScore);
    expect(objective(result.bestParams)).toBe(result.bestScore);
  });

  it('больше итераций с тем же seed не ухудшает результат', async () => {
    const short = await optimize(RANGES, objective, { iterations: 5, seed: 11 });
    const long = await optimize(RANGES, objective, { iterations: 15, seed: 11 });

    expect(long.trials.slice(0, 5)).toEqual(short.trials);
    expect(long.bestScore).toBeGreaterThanOrEqual(short.bestScore);
  });

  it('iterations = 1 возвращает первую попытку', async () => {
    const result = await optimize(RANGES, objective, { iterations: 1, seed: 5 });

    expect(result.trials).toHaveLength(1);
    expect(result.bestParams).toEqual(result.trials[0]!.params);
    expect(result.bestScore).toBe(result.trials[0]!.score);
  });

  it('при равных оценках остаётся первая попытка', async () => {
    const result = await optimize(RANGES, () => 0.5, { iterations: 8, seed: 9 });

    expect(result.bestParams).toBe(result.trials[0]!.params);
  });

  it('вырожденный диапазон фиксирует параметр', async () => {
    const result = await optimize({ content: [1.5, 1.5] }, () => 1, { iterations: 3, seed: 1 });

    expect(result.trials.map((t) => t.params['content'])).toEqual([1.5, 1.5, 1.5]);
  });

  it('упавшая целевая функция даёт -Infinity и сообщается репортеру', async () => {
    const reporter = fakeReporter();
    const failure = new Error('evaluation failed');
    let calls = 0;

    const result = await optimize(
      RANGES,
      (params) => {
        calls++;
        if (calls === 1) {
          throw failure;
        }
        return objective(params);
      },
      { iterations: 3, seed: 13, reporter },
    );

    expect(result.trials[0]!.score).toBe(Number.NEGATIVE_INFINITY);
    expect(result.bestScore).toBeGreaterThan(Number.NEGATIVE_INFINITY);
    expect(reporter.onTrialFailed).toHaveBeenCalledWith(result.trials[0]!.params, failure);
    expect(reporter.onTrialComplete).toHaveBeenCalledTimes(3);
  });

  it('NaN от целевой функции считается -Infinity', async () => {
    const result = await optimize(RANGES, () => Number.NaN, { iterations: 2, seed: 1 });

    expect(result.trials.map((t) => t.score)).toEqual([Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY]);
    expect(result.bestParams).toBe(result.trials[0]!.params);
  });

  it('конкурентность не меняет результат', async () => {
    const asyncObjective = async (params: ParamValues): Promise<number> => {
      await new Promise((resolve) => setTimeout(resolve, Math.floor(params['content']! * 3)));
      return objective(params);
    };

    const sequential = await optimize(RANGES, asyncObjective, { iterations: 8, seed: 21 });
    const parallel = await optimize(RANGES, asyncObjective, { iterations: 8, seed: 21, concurrency: 4 });

    expect(parallel).toEqual(sequential);
  });

  it('без seed генерирует и возвращает свежий', async () => {
    const result = await optimize(RANGES, objective, { iterations: 2 });

    expect(Number.isInteger(result.seed)).toBe(true);
    const replay = await optimize(RANGES, objective, { iterations: 2, seed: result.seed });
    expect(replay.trials).toEqual(result.trials);
  });

  it('валидирует iterations и диапазоны', async () => {
    await expect(optimize(RANGES, objective, { iterations: 0 })).rejects.toThrow(
      'iterations must be an integer >= 1, got 0',
    );
    await expect(optimize(RANGES, objective, { iterations: 1.5 })).rejects.toThrow('iterations must be an integer');
    await expect(optimize({}, objective, { iterations: 1 })).rejects.toThrow(
      'Parameter ranges must name at least one parameter',
    );
    await expect(optimize({ content: [2, 1] }, objective, { iterations: 1 })).rejects.toThrow(
      'Invalid range for "content": [2, 1)',
    );
  });
});
