// Удаление повторов из упорядоченного списка по логической идентичности.

// Оставляет первое вхождение каждой идентичности, сохраняя порядок первых вхождений.
export function dedupe<T, K>(items: readonly T[], identityOf: (item: T) => K): T[] {
  const seen = new Set<K>();
  const result: T[] = [];

  for (const item of items) {
    const identity = identityOf(item);

    if (seen.has(identity)) {
      continue;
    }

    seen.add(identity);
    result.push(item);
  }

  return result;
}
