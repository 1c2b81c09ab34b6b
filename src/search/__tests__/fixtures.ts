// Общие фейки для тестов поиска.
import { vi } from 'vitest';
import type { TextEmbedder } from '../../embeddings/types.js';
import type { DocumentStore, StoreHit } from '../../storage/documents.js';
import type { DocumentFields } from '../types.js';

export function fields(id: string, videoId = `video-${id}`): DocumentFields {
  return {
    textFields: { content: `content ${id}`, title: `title ${id}`, description: '' },
    keywordFields: { video_id: videoId, author: 'author', upload_date: '2024-01-01' },
  };
}

export function storeHit(id: string, score: number, videoId?: string): StoreHit {
  return { id, score, fields: fields(id, videoId) };
}

export function fakeStore(textHits: StoreHit[] = [], vectorHits: StoreHit[] = []) {
  return {
    searchText: vi.fn<DocumentStore['searchText']>().mockResolvedValue(textHits),
    searchVector: vi.fn<DocumentStore['searchVector']>().mockResolvedValue(vectorHits),
  };
}

export function fakeEmbedder(vector: number[] = [0.1, 0.2, 0.3]) {
  return {
    dimensions: vector.length,
    model: 'fake',
    embed: vi.fn<TextEmbedder['embed']>().mockResolvedValue(vector),
    embedBatch: vi.fn<TextEmbedder['embedBatch']>().mockResolvedValue([vector]),
    embedQuery: vi.fn<TextEmbedder['embedQuery']>().mockResolvedValue(vector),
  };
}
