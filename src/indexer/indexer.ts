// Индексация документов: embed -> store.
import type { TextEmbedder } from '../embeddings/types.js';
import { dedupe } from '../search/dedupe.js';
import type { Document } from '../search/types.js';
import type { CollectionRow } from '../storage/schema.js';
import { embeddingText } from './jsonl.js';
import type { DocumentInput } from './jsonl.js';
import type { IndexResult, ProgressReporter } from './progress.js';

// Размер батча для эмбеддингов.
const EMBED_BATCH_SIZE = 64;

// Запись документов (DocumentStorage).
export interface DocumentWriter {
  ensureCollection(name: string, dimensions: number, embeddingModel: string): Promise<CollectionRow>;
  upsertBatch(collection: string, documents: Document[]): Promise<void>;
}

export class Indexer {
  constructor(
    private writer: DocumentWriter,
    private embedder: TextEmbedder,
    private progress: ProgressReporter,
  ) {}

  async indexDocuments(collection: string, inputs: DocumentInput[]): Promise<IndexResult> {
    const startTime = Date.now();

    // Повторный id в файле: побеждает первое вхождение.
    const documents = dedupe(inputs, (input) => input.id);
    this.progress.onParsed(documents.length, inputs.length - documents.length);

    // Коллекция проверяется до запросов к API эмбеддингов.
    await this.writer.ensureCollection(collection, this.embedder.dimensions, this.embedder.model);

    const embeddings: number[][] = [];
    for (let i = 0; i < documents.length; i += EMBED_BATCH_SIZE) {
      const batch = documents.slice(i, i + EMBED_BATCH_SIZE);
      embeddings.push(...(await this.embedder.embedBatch(batch.map(embeddingText))));
      this.progress.onEmbedProgress(Math.min(i + EMBED_BATCH_SIZE, documents.length), documents.length);
    }

    if (embeddings.length !== documents.length) {
      throw new Error(`Embedder returned ${embeddings.length} vectors for ${documents.length} documents`);
    }

    await this.writer.upsertBatch(
      collection,
      documents.map((document, i) => ({ ...document, embedding: embeddings[i]! })),
    );
    this.progress.onStoreComplete();

    const result: IndexResult = {
      collection,
      totalDocuments: documents.length,
      duplicates: inputs.length - documents.length,
      duration: Date.now() - startTime,
    };
    this.progress.onComplete(result);

    return result;
  }
}
