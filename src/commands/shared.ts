// Общие части команд trag.
import type { AppConfig } from '../config/index.js';
import { createTextEmbedder } from '../embeddings/index.js';
import { createHybridSearcher } from '../search/index.js';
import type { HybridSearcher } from '../search/index.js';
import { DocumentStorage } from '../storage/index.js';
import type postgres from 'postgres';

// Опция --config есть у всех команд.
export interface ConfigOption {
  config?: string;
}

// Единая обработка ошибок на границе команды.
export function failCommand(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Ошибка: ${message}`);
  process.exit(1);
}

// Поиск по коллекции из конфигурации.
export function buildSearcher(config: AppConfig, sql: postgres.Sql): HybridSearcher {
  return createHybridSearcher(
    new DocumentStorage(sql),
    createTextEmbedder(config.embeddings),
    config.search,
  );
}

// Парсер целых положительных аргументов для commander.
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

// Метрика с четырьмя знаками.
export function formatScore(value: number): string {
  return Number.isFinite(value) ? value.toFixed(4) : String(value);
}
