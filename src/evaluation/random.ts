// Детерминированный генератор случайных чисел для воспроизводимых прогонов.
import { randomInt } from 'node:crypto';

// Источник равномерных чисел в [0, 1).
export type RandomSource = () => number;

// Верхняя граница seed (32 бита).
const SEED_LIMIT = 2 ** 32;

// Свежий seed для прогонов без явного seed.
export function freshSeed(): number {
  return randomInt(0, 2 ** 31 - 1);
}

// mulberry32: одинаковый seed — одинаковая последовательность.
export function createRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed) || seed < 0 || seed >= SEED_LIMIT) {
    throw new Error(`Seed must be an integer in [0, 2^32), got ${seed}`);
  }

  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Выборка без возвращения (частичный Фишер–Йетс), порядок определяется random.
export function sample<T>(items: readonly T[], size: number, random: RandomSource): T[] {
  const pool = [...items];
  const count = Math.min(size, pool.length);

  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j]!, pool[i]!];
  }

  return pool.slice(0, count);
}
