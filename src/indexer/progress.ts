// Репортер прогресса индексации.

export interface IndexResult {
  collection: string;
  totalDocuments: number;
  // Документы, повторявшие id ранее встреченного в файле.
  duplicates: number;
  duration: number;
}

export interface ProgressReporter {
  onParsed(documentCount: number, duplicateCount: number): void;
  onEmbedProgress(current: number, total: number): void;
  onStoreComplete(): void;
  onComplete(result: IndexResult): void;
}

// Вывод прогресса в консоль.
export class ConsoleProgress implements ProgressReporter {
  onParsed(documentCount: number, duplicateCount: number): void {
    const suffix = duplicateCount > 0 ? ` (${duplicateCount} дубликатов пропущено)` : '';
    console.log(`  Документы: ${documentCount}${suffix}`);
  }

  onEmbedProgress(current: number, total: number): void {
    console.log(`  Эмбеддинги: ${current}/${total}`);
  }

  onStoreComplete(): void {
    console.log('  Сохранение в БД: завершено');
  }

  onComplete(result: IndexResult): void {
    const seconds = (result.duration / 1000).toFixed(1);
    console.log(`  Готово: ${result.totalDocuments} документов в "${result.collection}" за ${seconds}с`);
  }
}

export const silentProgress: ProgressReporter = {
  onParsed: () => {},
  onEmbedProgress: () => {},
  onStoreComplete: () => {},
  onComplete: () => {},
};
