// Разбор входного JSONL: один документ транскрипта на строку.
import { z } from 'zod';
import type { DocumentFields } from '../search/types.js';

// Поля, которых нет в строке, становятся пустыми строками.
const DocumentInputSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  content: z.string(),
  title: z.string().default(''),
  description: z.string().default(''),
  video_id: z.string().default(''),
  author: z.string().default(''),
  upload_date: z.string().default(''),
});

// Документ до расчёта эмбеддинга.
export interface DocumentInput extends DocumentFields {
  id: string;
}

// Разбирает JSONL; пустые строки пропускаются, ошибка указывает номер строки.
export function parseDocumentsJsonl(text: string): DocumentInput[] {
  const documents: DocumentInput[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new Error(`Line ${index + 1}: invalid JSON`, { cause: error });
    }

    const result = DocumentInputSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new Error(`Line ${index + 1}: ${issue?.path.join('.') || 'document'} ${issue?.message ?? 'is invalid'}`);
    }

    const { id, content, title, description, video_id, author, upload_date } = result.data;
    documents.push({
      id,
      textFields: { content, title, description },
      keywordFields: { video_id, author, upload_date },
    });
  });

  return documents;
}

// Текст для эмбеддинга: транскрипт + заголовок.
export function embeddingText(document: DocumentFields): string {
  return `${document.textFields.content} ${document.textFields.title}`;
}
