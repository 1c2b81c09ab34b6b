// POST JSON с повторами на 429, 5xx и сетевых ошибках — общий транспорт для провайдеров эмбеддингов и LLM.

// Политика повторов.
export interface RetryPolicy {
  // Максимальное количество повторных попыток.
  maxRetries: number;
  // Базовая задержка экспоненциального backoff при 5xx (мс).
  baseDelayMs: number;
  // Задержка при 429, умножается на номер попытки (мс). Без неё 429 ждёт как 5xx.
  rateLimitDelayMs?: number;
}

// Параметры запроса.
export interface PostJsonOptions {
  url: string;
  body: unknown;
  headers?: Record<string, string>;
  retry: RetryPolicy;
  // Префикс сообщений об ошибках и логов, например "Jina API".
  label: string;
  // Отмена запроса и ожидания между повторами.
  signal?: AbortSignal;
}

// Ответ с не-ok HTTP-статусом.
export class HttpStatusError extends Error {
  constructor(
    readonly label: string,
    readonly status: number,
    readonly statusText: string,
  ) {
    super(`${label} error: ${status} ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

// Промис с задержкой для retry; отмена сигналом отклоняет его с signal.reason.
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// Задержка перед попыткой attempt (1-based) после ошибки lastError.
function retryDelay(policy: RetryPolicy, attempt: number, lastError: Error | undefined): number {
  if (lastError instanceof HttpStatusError && lastError.status === 429 && policy.rateLimitDelayMs !== undefined) {
    return policy.rateLimitDelayMs * attempt;
  }
  return policy.baseDelayMs * Math.pow(2, attempt - 1);
}

// Отправляет JSON и возвращает разобранное тело ответа (валидирует вызывающий).
export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { url, retry, label, signal } = options;
  const body = JSON.stringify(options.body);
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= retry.maxRetries; attempt++) {
    if (attempt > 0) {
      const delayMs = retryDelay(retry, attempt, lastError);
      process.stderr.write(`  [${label}] retry ${attempt}/${retry.maxRetries}, wait ${Math.round(delayMs / 1000)}s\n`);
      await delay(delayMs, signal);
    }

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...options.headers,
        },
        body,
        signal,
      });
    } catch (error) {
      // Отмена вызывающим не повторяется.
      if (signal?.aborted) {
        throw error;
      }
      // Сетевая ошибка (DNS, отказ в соединении, разрыв) — повтор как для 5xx.
      lastError = error instanceof Error ? error : new Error(`${label}: ${String(error)}`);
      continue;
    }

    // Retry на 429 (rate limit) и 5xx (серверные ошибки).
    if (response.status === 429 || response.status >= 500) {
      lastError = new HttpStatusError(label, response.status, response.statusText);
      continue;
    }

    // Остальные не-ok статусы — без retry.
    if (!response.ok) {
      throw new HttpStatusError(label, response.status, response.statusText);
    }

    return await response.json();
  }

  throw lastError ?? new Error(`${label}: unexpected retry exhaustion`);
}
