// Переписывание запроса LLM перед поиском (Chain-of-Thought или ReAct).
import type { TextGenerator } from '../llm/types.js';

export const REWRITE_METHODS = ['none', 'cot', 'react'] as const;
export type RewriteMethod = typeof REWRITE_METHODS[number];

// Маркеры, после которых модель пишет итоговый запрос.
const COT_MARKER = 'Rewritten query:';
const REACT_MARKER = 'Final rewritten query:';

export function buildCotPrompt(query: string): string {
  return [
    'Rewrite the following query using Chain-of-Thought reasoning.',
    'Think step by step about what the user is looking for,',
    `then write the improved search query on a single line after "${COT_MARKER}".`,
    '',
    `Query: ${query}`,
    '',
    COT_MARKER,
  ].join('\n');
}

export function buildReactPrompt(query: string): string {
  return [
    'Rewrite the following query using the ReAct framework (Reasoning and Acting):',
    `Query: ${query}`,
    '',
    'Thought 1:',
    'Action 1:',
    'Observation 1:',
    '',
    'Thought 2:',
    'Action 2:',
    'Observation 2:',
    '',
    REACT_MARKER,
  ].join('\n');
}

// Текст после последнего маркера; без маркера — весь ответ.
export function extractRewrittenQuery(output: string, marker: string): string {
  const index = output.toLowerCase().lastIndexOf(marker.toLowerCase());
  const tail = index === -1 ? output : output.slice(index + marker.length);
  return tail.trim().replace(/^["']|["']$/g, '').trim();
}

export class QueryRewriter {
  constructor(private generator: TextGenerator) {}

  // none — запрос без изменений, LLM не вызывается.
  // Пустой ответ модели оставляет исходный запрос.
  async rewrite(query: string, method: RewriteMethod): Promise<string> {
    if (method === 'none') {
      return query;
    }

    const [prompt, marker] = method === 'cot'
      ? [buildCotPrompt(query), COT_MARKER]
      : [buildReactPrompt(query), REACT_MARKER];

    const rewritten = extractRewrittenQuery(await this.generator.generate(prompt), marker);
    return rewritten || query;
  }
}
