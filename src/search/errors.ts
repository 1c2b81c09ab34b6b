// Ошибки поискового конвейера.

// Хранилище недоступно или коллекция не существует. Ядро не повторяет запрос.
export class SearchUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchUnavailableError';
  }
}

// Сервис эмбеддингов вернул ошибку. Фатально только для vector-ветки.
export class EmbeddingFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EmbeddingFailureError';
  }
}

// Текст исходной ошибки для сообщений.
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
