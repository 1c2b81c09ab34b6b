// Ограничение времени ожидания внешнего вызова.
import { SearchUnavailableError } from './errors.js';

// Запускает task с сигналом отмены. Если task не завершился за timeoutMs,
// сигнал отменяется, а результат отклоняется с SearchUnavailableError.
// Отмена действует только там, где task передаёт сигнал дальше (HTTP-запросы).
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new SearchUnavailableError(`${label} timed out after ${timeoutMs}ms`);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
