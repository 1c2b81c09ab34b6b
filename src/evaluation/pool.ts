// Пул воркеров с ограниченной конкурентностью.

// Выполняет worker для каждого элемента, не более concurrency одновременно.
// Результат i-го элемента пишется в i-й слот; агрегирует вызывающий после барьера.
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  // Однопоточный event loop: захват индекса next++ атомарен.
  const runWorker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index]!, index);
    }
  };

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => runWorker());
  await Promise.all(workers);

  return results;
}
