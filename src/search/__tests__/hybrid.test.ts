import { describe, it, expect } from 'vitest';
import { rrfFuse } from '../hybrid.js';
import type { RankedItem } from '../hybrid.js';

// Список из id в порядке ранга.
function ranked(...ids: string[]): RankedItem[] {
  return ids.map((documentId, index) => ({ documentId, rank: index + 1 }));
}

describe('rrfFuse', () => {
  it('один список: оценки 1/61, 1/62, 1/63 в исходном порядке', () => {
    const result = rrfFuse([ranked('A', 'B', 'C')]);

    expect(result.map((r) => r.documentId)).toEqual(['A', 'B', 'C']);
    expect(result[0]!.fusedScore).toBeCloseTo(1 / 61, 12);
    expect(result[1]!.fusedScore).toBeCloseTo(1 / 62, 12);
    expect(result[2]!.fusedScore).toBeCloseTo(1 / 63, 12);
  });

  it('суммирует вклады документа из нескольких списков', () => {
    const result = rrfFuse([ranked('a', 'b'), ranked('b', 'c')]);
    const scores = new Map(result.map((r) => [r.documentId, r.fusedScore]));

    expect(scores.get('a')).toBeCloseTo(1 / 61, 12);
    expect(scores.get('b')).toBeCloseTo(1 / 62 + 1 / 61, 12);
    expect(scores.get('c')).toBeCloseTo(1 / 62, 12);
    expect(result.map((r) => r.documentId)).toEqual(['b', 'a', 'c']);
  });

  it('равные оценки упорядочены по первому появлению', () => {
    const result = rrfFuse([ranked('A', 'B'), ranked('B', 'A')]);

    expect(result.map((r) => r.documentId)).toEqual(['A', 'B']);
    expect(result[0]!.fusedScore).toBe(result[1]!.fusedScore);
    expect(result[0]!.fusedScore).toBeCloseTo(1 / 61 + 1 / 62, 12);
  });

  it('tie-break учитывает позицию в конкатенации списков, а не в своём списке', () => {
    // x и y встречаются по одному разу на ранге 1; x — в первом списке.
    const result = rrfFuse([ranked('x'), ranked('y')]);

    expect(result.map((r) => r.documentId)).toEqual(['x', 'y']);
  });

  it('множество и оценки не зависят от порядка списков', () => {
    const first = ranked('a', 'b', 'c');
    const second = ranked('c', 'd');

    const forward = new Map(rrfFuse([first, second]).map((r) => [r.documentId, r.fusedScore]));
    const backward = new Map(rrfFuse([second, first]).map((r) => [r.documentId, r.fusedScore]));

    expect([...backward.keys()].sort()).toEqual([...forward.keys()].sort());
    for (const [id, score] of forward) {
      expect(backward.get(id)).toBeCloseTo(score, 12);
    }
  });

  it('учитывает параметр k', () => {
    const result = rrfFuse([ranked('a')], 1);

    expect(result[0]!.fusedScore).toBeCloseTo(1 / 2, 12);
  });

  it('возвращает пустой массив для пустого входа', () => {
    expect(rrfFuse([])).toEqual([]);
    expect(rrfFuse([[], []])).toEqual([]);
  });

  it('отклоняет неположительный или нечисловой k', () => {
    expect(() => rrfFuse([ranked('a')], 0)).toThrow('RRF k must be a positive finite number, got 0');
    expect(() => rrfFuse([ranked('a')], -5)).toThrow('RRF k must be a positive finite number');
    expect(() => rrfFuse([ranked('a')], Number.POSITIVE_INFINITY)).toThrow('RRF k must be a positive finite number');
  });

  it('результат отсортирован по убыванию оценки', () => {
    const result = rrfFuse([ranked('a', 'b', 'c', 'd'), ranked('d', 'c'), ranked('c')]);

    for (let i = 1; i < result.length; i++) {
      expect(result[i - 1]!.fusedScore).toBeGreaterThanOrEqual(result[i]!.fusedScore);
    }
    expect(result[0]!.documentId).toBe('c');
  });
});
