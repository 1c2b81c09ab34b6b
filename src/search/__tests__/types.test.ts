import { describe, it, expect } from 'vitest';
import { createFieldBoosts, isTextField } from '../types.js';

describe('createFieldBoosts', () => {
  it('принимает известные поля в допустимом диапазоне', () => {
    expect(createFieldBoosts({ content: 2.5, title: 0 })).toEqual({ content: 2.5, title: 0 });
  });

  it('отклоняет неизвестное поле', () => {
    expect(() => createFieldBoosts({ question: 1 })).toThrow();
  });

  it('отклоняет вес вне [0, 100]', () => {
    expect(() => createFieldBoosts({ content: -1 })).toThrow();
    expect(() => createFieldBoosts({ title: 101 })).toThrow();
  });

  it('отклоняет NaN', () => {
    expect(() => createFieldBoosts({ content: Number.NaN })).toThrow();
  });
});

describe('isTextField', () => {
  it('распознаёт текстовые поля', () => {
    expect(isTextField('description')).toBe(true);
    expect(isTextField('video_id')).toBe(false);
  });
});
