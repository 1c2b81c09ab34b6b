// Ошибки модуля оценки.

// Оценка запущена без размеченных вопросов — деление на ноль, ошибка вызывающего.
export class EmptyGroundTruthError extends Error {
  constructor(message = 'Ground truth is empty: nothing to evaluate') {
    super(message);
    this.name = 'EmptyGroundTruthError';
  }
}
