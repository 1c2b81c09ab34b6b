import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAITextEmbedder } from '../openai.js';
import { fakeVector, indexedData, jsonResponse, requestBody } from './helpers.js';

const CONFIG = {
  apiKey: 'test-api-key',
  model: 'text-embedding-3-small',
  dimensions: 4,
  baseUrl: 'https://api.openai.com/v1',
};

describe('OpenAITextEmbedder', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('отправляет model, input и dimensions на /embeddings', async () => {
    const vector = fakeVector(4);
    fetchMock.mockResolvedValueOnce(jsonResponse(indexedData([vector])));

    const result = await new OpenAITextEmbedder(CONFIG).embed('текст');

    expect(result).toEqual(vector);
    expect(fetchMock.mock.calls[0]![0]).toBe('https://api.openai.com/v1/embeddings');
    expect(requestBody(fetchMock.mock.calls[0])).toEqual({
      model: 'text-embedding-3-small',
      input: ['текст'],
      dimensions: 4,
    });
  });

  it('baseUrl совместимого сервера без завершающего слэша', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(indexedData([fakeVector(4)])));

    await new OpenAITextEmbedder({ ...CONFIG, baseUrl: 'http://localhost:8080/v1/' }).embedQuery('q');

    expect(fetchMock.mock.calls[0]![0]).toBe('http://localhost:8080/v1/embeddings');
  });

  it('embedBatch() режет вход на батчи по 100', async () => {
    fetchMock.mockImplementation(async (_url: string, init: RequestInit) => {
      const body = JSON.parse(String(init.body)) as { input: string[] };
      return jsonResponse(indexedData(body.input.map(() => fakeVector(4))));
    });

    const results = await new OpenAITextEmbedder(CONFIG).embedBatch(Array.from({ length: 250 }, (_, i) => `t${i}`));

    expect(fetchMock.mock.calls.map((call) => (requestBody(call)['input'] as string[]).length)).toEqual([100, 100, 50]);
    expect(results).toHaveLength(250);
  });
});
