// RAG: гибридный поиск по транскриптам + ответ LLM.
import type { TextGenerator } from '../llm/types.js';
import type { HybridSearcher } from '../search/coordinator.js';
import type { HybridResult } from '../search/types.js';
import { QueryRewriter } from './query-rewriter.js';
import type { RewriteMethod } from './query-rewriter.js';

// Ответ вместе с найденным контекстом.
export interface RagAnswer {
  answer: string;
  // Запрос, с которым выполнялся поиск (после переписывания).
  searchQuery: string;
  context: HybridResult[];
}

export interface AnswerOptions {
  rewrite?: RewriteMethod;
}

// Собирает промпт с пронумерованными сегментами транскриптов.
export function buildAnswerPrompt(question: string, context: readonly HybridResult[]): string {
  const segments = context.map((result, i) => {
    const { title, content } = result.textFields;
    const header = title ? `${i + 1}. ${title} (${result.keywordFields.video_id || result.documentId})` : `${i + 1}. ${result.documentId}`;
    return `${header}\n${content}`;
  });

  return [
    'You are a helpful assistant answering questions about YouTube video transcripts.',
    'Answer the QUESTION using only the facts from the CONTEXT.',
    'If the CONTEXT does not contain the answer, say that you do not know.',
    '',
    `QUESTION: ${question}`,
    '',
    'CONTEXT:',
    '',
    segments.length > 0 ? segments.join('\n\n') : '(no matching transcripts)',
  ].join('\n');
}

// Конвейер вопрос -> поиск -> промпт -> ответ.
// Переписанный запрос используется только для поиска, LLM отвечает на исходный вопрос.
export class RagPipeline {
  private rewriter: QueryRewriter;

  constructor(
    private searcher: HybridSearcher,
    private generator: TextGenerator,
    private numResults?: number,
  ) {
    this.rewriter = new QueryRewriter(generator);
  }

  async answer(question: string, options: AnswerOptions = {}): Promise<RagAnswer> {
    const searchQuery = await this.rewriter.rewrite(question, options.rewrite ?? 'none');
    const { results } = await this.searcher.search({ query: searchQuery, numResults: this.numResults });
    const answer = await this.generator.generate(buildAnswerPrompt(question, results));
    return { answer: answer.trim(), searchQuery, context: results };
  }
}
