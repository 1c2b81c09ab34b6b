// Репортер прогресса оценки и оптимизации.

// Интерфейс репортера прогресса.
export interface EvaluationReporter {
  onQueryComplete(completed: number, total: number): void;
  onQueryFailed(query: string, error: unknown): void;
  onTrialComplete(trial: number, total: number, score: number, best: number): void;
  onTrialFailed(params: Record<string, number>, error: unknown): void;
}

// Репортер, который ничего не выводит.
export const silentReporter: EvaluationReporter = {
  onQueryComplete: () => {},
  onQueryFailed: () => {},
  onTrialComplete: () => {},
  onTrialFailed: () => {},
};

// Вывод прогресса в консоль (stderr — stdout остаётся для результатов).
export class ConsoleEvaluationReporter implements EvaluationReporter {
  onQueryComplete(completed: number, total: number): void {
    process.stderr.write(`\r  Вопросы: ${completed}/${total}`);
    if (completed === total) {
      process.stderr.write('\n');
    }
  }

  onQueryFailed(query: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`\n  Ошибка поиска для "${query.slice(0, 60)}": ${message}\n`);
  }

  onTrialComplete(trial: number, total: number, score: number, best: number): void {
    console.error(`  Попытка ${trial}/${total}: ${score.toFixed(4)} (лучшая ${best.toFixed(4)})`);
  }

  onTrialFailed(params: Record<string, number>, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`  Попытка с параметрами ${JSON.stringify(params)} упала: ${message}`);
  }
}
