// RRF (Reciprocal Rank Fusion) — объединение ранжированных списков разных источников.
import type { FusedResult } from './types.js';

// Стандартная константа RRF.
export const DEFAULT_RRF_K = 60;

// Минимальный контракт элемента списка: идентификатор и 1-based ранг.
export interface RankedItem {
  documentId: string;
  rank: number;
}

// Объединяет списки через Reciprocal Rank Fusion.
// Формула: rrf_score(d) = Σ 1 / (k + rank_i(d)) по всем спискам, где d присутствует.
// Документ, отсутствующий в списке, получает от него 0.
// При равных оценках порядок — позиция первого появления документа
// в конкатенации списков (список за списком).
export function rrfFuse(
  lists: ReadonlyArray<ReadonlyArray<RankedItem>>,
  k: number = DEFAULT_RRF_K,
): FusedResult[] {
  if (!Number.isFinite(k) || k <= 0) {
    throw new Error(`RRF k must be a positive finite number, got ${k}`);
  }

  // Накопитель оценок; Map сохраняет порядок первой вставки.
  const scores = new Map<string, { score: number; firstSeen: number }>();
  let position = 0;

  for (const list of lists) {
    for (const hit of list) {
      const contribution = 1 / (k + hit.rank);
      const entry = scores.get(hit.documentId);

      if (entry) {
        entry.score += contribution;
      } else {
        scores.set(hit.documentId, { score: contribution, firstSeen: position });
      }

      position++;
    }
  }

  const fused = [...scores].map(([documentId, entry]) => ({
    documentId,
    fusedScore: entry.score,
    firstSeen: entry.firstSeen,
  }));

  // Явный tie-break вместо опоры на стабильность sort.
  fused.sort((a, b) => b.fusedScore - a.fusedScore || a.firstSeen - b.firstSeen);

  return fused.map(({ documentId, fusedScore }) => ({ documentId, fusedScore }));
}
