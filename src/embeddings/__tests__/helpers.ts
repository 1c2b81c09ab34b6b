// Общие заготовки для тестов HTTP-провайдеров.

export function fakeVector(dimensions: number, seed = 0): number[] {
  return Array.from({ length: dimensions }, (_, i) => (i + seed) * 0.001);
}

export function jsonResponse(body: unknown) {
  return { ok: true, status: 200, statusText: 'OK', json: async () => body };
}

export function errorResponse(status: number, statusText: string) {
  return { ok: false, status, statusText };
}

// Ответ вида OpenAI/Jina: data[] с индексами.
export function indexedData(vectors: number[][]) {
  return { data: vectors.map((embedding, index) => ({ index, embedding })) };
}

// Тело запроса из вызова fetch.
export function requestBody(call: unknown[] | undefined): Record<string, unknown> {
  const init = call?.[1];
  if (!init || typeof init !== 'object' || !('body' in init) || typeof init.body !== 'string') {
    throw new Error('fetch was not called with a JSON body');
  }
  return JSON.parse(init.body) as Record<string, unknown>;
}
